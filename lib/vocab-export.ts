import { extname } from "node:path";
import type { VocabTerm } from "@/types";

export type ExportFormat = "txt" | "csv";

export function formatForPath(path: string): ExportFormat {
  return extname(path).toLowerCase() === ".csv" ? "csv" : "txt";
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * txt: one term per line, no trailing newline.
 * csv: a `vocabulary` header row, CRLF-terminated rows.
 */
export function formatVocabList(words: readonly VocabTerm[], format: ExportFormat): string {
  if (format === "txt") {
    return words.join("\n");
  }
  return ["vocabulary", ...words].map((word) => `${csvField(word)}\r\n`).join("");
}
