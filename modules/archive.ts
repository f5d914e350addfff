import type { Rule } from "./rules";

export const UNKNOWN_PREFIX = "UNK";

/** A rule without filename patterns accepts every attachment. */
export function shouldProcessAttachment(rule: Rule | undefined, filename: string): boolean {
  if (!rule || rule.pdf_filename_patterns.length === 0) return true;

  const name = filename.toLowerCase();
  return rule.pdf_filename_patterns.some((pattern) => name.includes(pattern.toLowerCase()));
}

export function buildArchiveFilename(dueDate: string, prefix: string, originalName: string): string {
  return `${dueDate}_${prefix || UNKNOWN_PREFIX}_${originalName}`;
}

export function todayStamp(now: Date = new Date()): string {
  const year = String(now.getFullYear()).padStart(4, "0");
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}${month}${day}`;
}
