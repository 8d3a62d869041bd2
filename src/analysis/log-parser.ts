/**
 * Tabular input readers.
 *
 * Audit exports arrive as delimited text (CSV/TSV) or as an .xlsx workbook.
 * Both are read into the same column/row shape; which columns matter is the
 * normalizer's business, so extra columns pass through untouched.
 */

import { readFile, stat } from "fs/promises";
import { basename } from "path";
import { Workbook, type Cell } from "exceljs";
import { DELIMITED_EXTENSIONS, SPREADSHEET_EXTENSIONS } from "@/lib/constants";
import { AnalysisError, UnsupportedFormatError } from "@/lib/errors";
import { fileExtension, uploadFileSchema } from "@/lib/validations/upload";
import type { CellValue, TabularData } from "@/analysis/types";

export type InputFormat = "delimited" | "spreadsheet";

export type Delimiter = "," | ";" | "\t";

/**
 * Pick the reader from the file extension. Throws before anything is read.
 */
export function detectInputFormat(fileName: string): InputFormat {
  const ext = fileExtension(fileName);
  if (DELIMITED_EXTENSIONS.includes(ext)) return "delimited";
  if (SPREADSHEET_EXTENSIONS.includes(ext)) return "spreadsheet";
  throw new UnsupportedFormatError(ext);
}

export async function readTabularFile(filePath: string): Promise<TabularData> {
  const format = detectInputFormat(filePath);

  const { size } = await stat(filePath);
  const checked = uploadFileSchema.safeParse({ fileName: basename(filePath), fileSize: size });
  if (!checked.success) {
    throw new AnalysisError("FILE_TOO_LARGE", checked.error.issues.map((issue) => issue.message).join("; "));
  }

  if (format === "spreadsheet") {
    return readSpreadsheet(filePath);
  }
  return parseDelimitedText(decodeText(await readFile(filePath)));
}

/**
 * Decode as UTF-8, falling back to Latin-1 when the bytes are not valid UTF-8.
 */
export function decodeText(buffer: Buffer): string {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    text = buffer.toString("latin1");
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Detect the delimiter from the header line: the candidate that splits it
 * into the most fields wins, comma on ties.
 */
export function detectDelimiter(headerLine: string): Delimiter {
  const candidates: Delimiter[] = [",", ";", "\t"];
  let best: Delimiter = ",";
  let bestCount = 0;
  for (const candidate of candidates) {
    const count = headerLine.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Split delimited text into records. Handles quoted fields containing the
 * delimiter, doubled quotes and line breaks.
 */
export function parseDelimitedRecords(text: string, delimiter: Delimiter): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++; // skip escaped quote
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      record.push(current);
      current = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      record.push(current);
      records.push(record);
      record = [];
      current = "";
    } else {
      current += ch;
    }
  }

  if (current !== "" || record.length > 0) {
    record.push(current);
    records.push(record);
  }

  // Blank lines come through as a single empty field
  return records.filter((r) => !(r.length === 1 && r[0].trim() === ""));
}

export function parseDelimitedText(text: string): TabularData {
  const firstBreak = text.search(/\r?\n/);
  const headerLine = firstBreak === -1 ? text : text.slice(0, firstBreak);
  const records = parseDelimitedRecords(text, detectDelimiter(headerLine));
  if (records.length === 0) return { columns: [], rows: [] };

  const columns = records[0].map((col) => col.trim());
  const rows = records.slice(1).map((values) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      row[column] = values[i] ?? "";
    });
    return row;
  });

  return { columns, rows };
}

function cellValue(cell: Cell): CellValue {
  const value = cell.value;
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  // Rich text, hyperlinks, formulas and errors: use the displayed text
  return cell.text;
}

/**
 * Read the first worksheet of an .xlsx workbook; row 1 is the header.
 */
export async function readSpreadsheet(filePath: string): Promise<TabularData> {
  const workbook = new Workbook();
  await workbook.xlsx.readFile(filePath);

  const sheet = workbook.worksheets[0];
  if (!sheet) return { columns: [], rows: [] };

  const header = sheet.getRow(1);
  const columns: string[] = [];
  for (let col = 1; col <= header.cellCount; col++) {
    columns.push(header.getCell(col).text.trim());
  }

  const rows: Record<string, CellValue>[] = [];
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      record[column] = cellValue(row.getCell(i + 1));
    });
    rows.push(record);
  });

  return { columns, rows };
}
