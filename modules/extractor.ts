import type { Classification } from "./classifier";
import { UNKNOWN_PARTNER, type Rule, type RuleSnapshot } from "./rules";

export class AmountParseError extends Error {
  raw: string;
  constructor(raw: string) {
    super(`Not a number: "${raw}"`);
    this.name = "AmountParseError";
    this.raw = raw;
  }
}

const PATTERN_FLAGS = "im";
const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const FOUR_DIGITS = /^\d{4}$/;
const DIGITS = /^\d+$/;

function toNumber(raw: string): number {
  const trimmed = raw.trim();
  if (!NUMERIC.test(trimmed)) {
    throw new AmountParseError(raw);
  }
  return Number(trimmed);
}

/** Hungarian e-mail format: `1.234.567,89` → 1234567.89 */
export function parseEmailAmount(raw: string): number {
  return toNumber(raw.replace(/\./g, "").replace(/,/g, "."));
}

/**
 * PDF amounts come in three shapes:
 *   "3 548.94"  space thousands, dot decimal
 *   "21 489,50" space thousands, comma decimal
 *   "21.489,50" dot thousands, comma decimal
 */
export function parsePdfAmount(raw: string): number {
  const value = raw.trim().replace(/[\u00a0\u202f]/g, " ");

  if (value.includes(" ")) {
    const dots = value.split(".").length - 1;
    if (dots === 1) {
      return toNumber(value.replace(/ /g, ""));
    }
    return toNumber(value.replace(/ /g, "").replace(/,/g, "."));
  }

  return toNumber(value.replace(/\./g, "").replace(/,/g, "."));
}

/** EUR amounts use dot decimals; commas are thousands separators. */
export function parseEurAmount(raw: string): number {
  return toNumber(raw.replace(/,/g, ""));
}

export function emailTextOf(message: { subject: string; body: string }): string {
  return `${message.subject} ${message.body}`;
}

function compile(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern, PATTERN_FLAGS);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`extractor: pattern '${pattern}' failed: ${message}`);
    return null;
  }
}

function firstCapture(match: RegExpExecArray): string {
  return match.length > 1 ? (match[1] ?? "") : match[0];
}

/** First pattern whose capture parses wins; bad patterns and captures are skipped. */
function extractWith(
  text: string,
  patterns: readonly string[],
  parse: (raw: string) => number,
  label: string
): number | null {
  for (const pattern of patterns) {
    const regex = compile(pattern);
    if (!regex) continue;

    const match = regex.exec(text);
    if (!match) continue;

    try {
      return parse(firstCapture(match));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`extractor: ${label} pattern '${pattern}' failed: ${message}`);
    }
  }
  return null;
}

function ruleFor(snapshot: RuleSnapshot, classification: Classification): Rule | undefined {
  return snapshot.rules.get(classification.partner_name);
}

/**
 * Primary (HUF) amount. `method` on the rule picks the sources; with "both"
 * the e-mail text is tried first. A zero result counts as not found.
 */
export function extractAmount(
  snapshot: RuleSnapshot,
  emailText: string,
  pdfText: string,
  classification: Classification
): number | null {
  const rule = ruleFor(snapshot, classification) ?? snapshot.defaultRule;
  const { method, email_patterns, pdf_patterns } = rule.amount_extraction;

  if (method === "none") return null;

  if (method === "email" || method === "both") {
    const amount = extractWith(emailText, email_patterns, parseEmailAmount, "email");
    if (amount) {
      console.log(`extractor: amount from email: ${amount}`);
      return amount;
    }
  }

  if ((method === "pdf" || method === "both") && pdfText) {
    const amount = extractWith(pdfText, pdf_patterns, parsePdfAmount, "PDF");
    if (amount) {
      console.log(`extractor: amount from PDF: ${amount}`);
      return amount;
    }
  }

  console.warn(`extractor: could not extract amount for ${classification.partner_name} using method: ${method}`);
  return null;
}

export function extractEurAmount(
  snapshot: RuleSnapshot,
  pdfText: string,
  classification: Classification
): number | null {
  if (!pdfText) return null;

  const patterns = ruleFor(snapshot, classification)?.amount_extraction.eur_extraction?.pdf_patterns;
  if (!patterns || patterns.length === 0) return null;

  const amount = extractWith(pdfText, patterns, parseEurAmount, "EUR");
  if (amount === null) {
    console.warn(`extractor: could not extract EUR amount for ${classification.partner_name}`);
  } else {
    console.log(`extractor: EUR amount: ${amount}`);
  }
  return amount;
}

function formatDate(year: number, month: number, day: number): string | null {
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) return null;

  const date = new Date(Date.UTC(2000, month - 1, day));
  date.setUTCFullYear(year);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;

  return [
    String(year).padStart(4, "0"),
    String(month).padStart(2, "0"),
    String(day).padStart(2, "0"),
  ].join("");
}

/**
 * Orders three captured fields into a date. A leading four-digit group is
 * Y-M-D. With a trailing year, a first field over 12 means D-M-Y, a second
 * field over 12 means M-D-Y, and anything else is read as M-D-Y even though
 * it may be a D-M-Y date.
 */
export function dateFromParts(first: string, second: string, third: string): string | null {
  if (![first, second, third].every((part) => DIGITS.test(part))) return null;

  const [a, b, c] = [first, second, third].map(Number);
  if (FOUR_DIGITS.test(first)) return formatDate(a, b, c);
  if (FOUR_DIGITS.test(third)) {
    if (a > 12) return formatDate(c, b, a);
    return formatDate(c, a, b);
  }
  return formatDate(c, b, a);
}

export function extractDueDate(
  snapshot: RuleSnapshot,
  pdfText: string,
  classification: Classification
): string | null {
  if (classification.partner_name === UNKNOWN_PARTNER) return null;

  const config = ruleFor(snapshot, classification)?.due_date_extraction;
  if (!config) return null;

  for (const pattern of config.pdf_patterns) {
    const regex = compile(pattern);
    if (!regex) continue;

    const match = regex.exec(pdfText);
    if (!match) continue;

    const groups = match.slice(1).map((group) => group ?? "");
    console.log(`extractor: due date match with pattern '${pattern}': ${match[0]}`);

    if (groups.length === 3) {
      const date = dateFromParts(groups[0], groups[1], groups[2]);
      if (date) return date;
      continue;
    }

    if (groups.length <= 1) {
      return firstCapture(match).replace(/[-.]/g, "");
    }
  }

  return null;
}
