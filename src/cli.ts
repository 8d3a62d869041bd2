/**
 * Audit log geolocation and anomaly CLI
 * Commands: analyze
 */

import { Command } from "commander";
import { AnalysisError } from "@/lib/errors";
import { naiveDateReplacer, runAnalyzeCommand } from "@/commands/analyze";

function buildProgram(): Command {
  const program = new Command();

  program
    .name("audit-geo-analyzer")
    .description("Geolocate audit-log exports and flag anomalous or compromised activity")
    .version("0.1.0");

  // analyze <file>
  program
    .command("analyze <file>")
    .description("Analyze a CSV/TSV/XLSX audit export and print the annotated timeline as JSON")
    .option("-c, --config <path>", "analyzer config file (default: ./analyzer.config.json)")
    .option("-f, --filter <path>", "filter configuration JSON applied to the timeline")
    .option("-p, --provider <name>", "geolocation provider: ip-api, geoip-lite or none")
    .option("-s, --summary", "print statistics only")
    .action(async (file: string, options: { config?: string; filter?: string; provider?: string; summary?: boolean }) => {
      const output = await runAnalyzeCommand(file, options);
      if (output.warning) console.error(`Warning: ${output.warning}`);
      console.log(JSON.stringify(output, naiveDateReplacer, 2));
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof AnalysisError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("Analysis failed:", error instanceof Error ? error.message : error);
    }
    process.exitCode = 1;
  });
