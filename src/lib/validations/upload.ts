import { extname } from "path";
import { z } from "zod/v4";
import { MAX_FILE_SIZE } from "@/lib/constants";

export const uploadFileSchema = z.object({
  fileName: z.string().min(1),
  fileSize: z.number().max(MAX_FILE_SIZE, "File must be 50MB or less"),
});

export function fileExtension(fileName: string): string {
  return extname(fileName).toLowerCase();
}
