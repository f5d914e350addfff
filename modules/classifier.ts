import { join } from "node:path";
import type { InvoiceType, Rule, RuleSnapshot, Settings } from "./rules";

export const MIN_CONFIDENCE = 0.5;

export const DEFAULT_PAYMENT_TYPES: Record<InvoiceType, string> = {
  kiadas_vallalati: "Vállalati számla",
  kiadas_penztár: "Saját",
};

export interface Classification {
  readonly partner_name: string;
  readonly invoice_type: InvoiceType;
  readonly payment_type: string;
  readonly folder_path: string;
  readonly confidence: number;
  readonly matched_patterns: readonly string[];
}

export interface RuleScore {
  score: number;
  matched: string[];
}

const EMAIL_WEIGHT = 2;
const SUBJECT_WEIGHT = 1;
const BODY_WEIGHT = 1;
const PDF_COUNT_WEIGHT = 1;

/**
 * Weighted match of one rule against already-lowercased message text.
 * Only dimensions the rule declares count toward the divisor, and within a
 * dimension the first matching pattern is the only one credited.
 */
export function scoreRule(
  rule: Rule,
  sender: string,
  subject: string,
  body: string,
  pdfCount: number
): RuleScore {
  let earned = 0;
  let possible = 0;
  const matched: string[] = [];

  const dimensions: Array<[string, readonly string[], string, number]> = [
    ["email", rule.email_patterns, sender, EMAIL_WEIGHT],
    ["subject", rule.subject_patterns, subject, SUBJECT_WEIGHT],
    ["body", rule.body_patterns, body, BODY_WEIGHT],
  ];

  for (const [label, patterns, text, weight] of dimensions) {
    if (patterns.length === 0) continue;
    possible += weight;
    const hit = patterns.find((pattern) => text.includes(pattern.toLowerCase()));
    if (hit !== undefined) {
      earned += weight;
      matched.push(`${label}: ${hit}`);
    }
  }

  if (rule.pdf_count_required !== undefined) {
    possible += PDF_COUNT_WEIGHT;
    if (pdfCount === rule.pdf_count_required) {
      earned += PDF_COUNT_WEIGHT;
      matched.push(`pdf_count: ${pdfCount}`);
    }
  }

  if (possible === 0) return { score: 0, matched };
  return { score: Math.min(Math.max(earned / possible, 0), 1), matched };
}

export function resolveFolderPath(settings: Settings, routingKey: string): string {
  const year = settings.current_year ?? new Date().getFullYear();
  const folderName = settings.folder_structure[routingKey] ?? routingKey;
  return join(settings.base_folder, String(year), folderName);
}

function buildClassification(
  rule: Rule,
  settings: Settings,
  confidence: number,
  matched: readonly string[]
): Classification {
  return Object.freeze({
    partner_name: rule.name,
    invoice_type: rule.invoice_type,
    payment_type: rule.payment_type,
    folder_path: resolveFolderPath(settings, rule.folder_override ?? rule.invoice_type),
    confidence,
    matched_patterns: Object.freeze([...matched]),
  });
}

export function classify(
  snapshot: RuleSnapshot,
  sender: string,
  subject: string,
  body: string,
  pdfCount: number
): Classification | null {
  const normalizedSender = sender.toLowerCase();
  const normalizedSubject = subject.toLowerCase();
  const normalizedBody = body.toLowerCase();

  let best: { rule: Rule; score: RuleScore } | null = null;

  for (const rule of snapshot.rules.values()) {
    const score = scoreRule(rule, normalizedSender, normalizedSubject, normalizedBody, pdfCount);
    if (score.score > (best?.score.score ?? 0)) {
      best = { rule, score };
    }
  }

  if (!best || best.score.score < MIN_CONFIDENCE) {
    const bestScore = best?.score.score ?? 0;
    console.log(`classifier: no rule reached ${MIN_CONFIDENCE} (best ${bestScore.toFixed(2)}), skipping`);
    return null;
  }

  const classification = buildClassification(
    best.rule,
    snapshot.settings,
    best.score.score,
    best.score.matched
  );
  console.log(
    `classifier: ${classification.partner_name} (${classification.invoice_type}) confidence ${classification.confidence.toFixed(2)}`
  );
  return classification;
}

/**
 * Post-hoc correction, e.g. after a person confirms the expense type.
 * Returns a new classification; the folder follows the new type.
 */
export function withInvoiceType(
  classification: Classification,
  invoiceType: InvoiceType,
  settings: Settings,
  paymentType: string = DEFAULT_PAYMENT_TYPES[invoiceType]
): Classification {
  return Object.freeze({
    ...classification,
    invoice_type: invoiceType,
    payment_type: paymentType,
    folder_path: resolveFolderPath(settings, invoiceType),
  });
}
