import { readFileSync } from "node:fs";
import { z } from "zod";

export const InvoiceTypeSchema = z.enum(["kiadas_vallalati", "kiadas_penztár"]);

export const AmountMethodSchema = z.enum(["email", "pdf", "both", "none"]);

const PatternListSchema = z.array(z.string().min(1)).default([]);

export const AmountExtractionSchema = z.object({
  method: AmountMethodSchema.default("both"),
  email_patterns: PatternListSchema,
  pdf_patterns: PatternListSchema,
  eur_extraction: z
    .object({
      pdf_patterns: PatternListSchema,
    })
    .optional(),
});

export const DueDateExtractionSchema = z.object({
  pdf_patterns: PatternListSchema,
});

export const RuleSchema = z.object({
  name: z.string().min(1),
  email_patterns: PatternListSchema,
  subject_patterns: PatternListSchema,
  body_patterns: PatternListSchema,
  pdf_count_required: z.number().int().positive().optional(),
  invoice_type: InvoiceTypeSchema.default("kiadas_vallalati"),
  payment_type: z.string().default("Vállalati számla"),
  folder_override: z.string().min(1).optional(),
  filename_prefix: z.string().min(1).default("UNK"),
  sheet_description: z.string().default(""),
  amount_extraction: AmountExtractionSchema.default({}),
  due_date_extraction: DueDateExtractionSchema.optional(),
  pdf_filename_patterns: PatternListSchema,
});

export const ExclusionRuleSchema = z.object({
  name: z.string().min(1),
  email_patterns: PatternListSchema,
  subject_patterns: PatternListSchema,
});

export const SheetsSettingsSchema = z.object({
  spreadsheet_id: z.string().optional(),
  worksheet_template: z.string().default("{year}"),
  columns: z
    .record(z.string(), z.object({ target: z.string() }))
    .default({}),
});

export const SettingsSchema = z
  .object({
    base_folder: z.string().min(1),
    current_year: z.number().int().optional(),
    folder_structure: z.record(z.string(), z.string()).default({}),
    google_sheets: SheetsSettingsSchema.optional(),
  })
  .passthrough();

export const RuleConfigSchema = z.object({
  rules: z.array(RuleSchema),
  exclusion_rules: z.array(ExclusionRuleSchema).default([]),
  default_rule: RuleSchema.optional(),
  settings: SettingsSchema,
});

export type InvoiceType = z.infer<typeof InvoiceTypeSchema>;
export type Rule = Readonly<z.infer<typeof RuleSchema>>;
export type ExclusionRule = Readonly<z.infer<typeof ExclusionRuleSchema>>;
export type Settings = Readonly<z.infer<typeof SettingsSchema>>;

export interface RuleSnapshot {
  readonly rules: ReadonlyMap<string, Rule>;
  readonly exclusionRules: readonly ExclusionRule[];
  readonly defaultRule: Rule;
  readonly settings: Settings;
  readonly loadedAt: Date;
}

export class ConfigLoadError extends Error {
  source: string | null;
  constructor(message: string, source: string | null = null) {
    super(message);
    this.name = "ConfigLoadError";
    this.source = source;
  }
}

export const UNKNOWN_PARTNER = "Unknown Invoice";

const FALLBACK_DEFAULT_RULE: Rule = RuleSchema.parse({ name: UNKNOWN_PARTNER });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function collectPatterns(rule: Rule): string[] {
  const { amount_extraction, due_date_extraction } = rule;
  return [
    ...amount_extraction.email_patterns,
    ...amount_extraction.pdf_patterns,
    ...(amount_extraction.eur_extraction?.pdf_patterns ?? []),
    ...(due_date_extraction?.pdf_patterns ?? []),
  ];
}

// Bad regexes are reported here but only skipped at extraction time.
function warnOnInvalidPatterns(rule: Rule): void {
  for (const pattern of collectPatterns(rule)) {
    try {
      new RegExp(pattern, "im");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`rules: invalid pattern in rule "${rule.name}": ${pattern} (${message})`);
    }
  }
}

function indexRules(rules: readonly Rule[]): Map<string, Rule> {
  const byName = new Map<string, Rule>();
  for (const rule of rules) {
    if (byName.has(rule.name)) {
      console.warn(`rules: duplicate rule name "${rule.name}", later entry overwrites earlier`);
    }
    warnOnInvalidPatterns(rule);
    byName.set(rule.name, Object.freeze(rule));
  }
  return byName;
}

export function parseRuleConfig(raw: unknown, source: string | null = null): RuleSnapshot {
  const result = RuleConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigLoadError(`Invalid rule configuration: ${formatIssues(result.error)}`, source);
  }

  const config = result.data;
  const snapshot: RuleSnapshot = {
    rules: indexRules(config.rules),
    exclusionRules: Object.freeze(config.exclusion_rules.map((rule) => Object.freeze(rule))),
    defaultRule: Object.freeze(config.default_rule ?? FALLBACK_DEFAULT_RULE),
    settings: Object.freeze(config.settings),
    loadedAt: new Date(),
  };

  console.log(
    `rules: loaded ${snapshot.rules.size} processing rules and ${snapshot.exclusionRules.length} exclusion rules`
  );
  return Object.freeze(snapshot);
}

export function loadRuleConfig(source: string): RuleSnapshot {
  let text: string;
  try {
    text = readFileSync(source, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ConfigLoadError(`Rules file could not be read: ${source} (${message})`, source);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new ConfigLoadError(`Rules file is not valid JSON: ${source} (${message})`, source);
  }

  return parseRuleConfig(raw, source);
}

export type ReloadResult =
  | { ok: true; snapshot: RuleSnapshot }
  | { ok: false; error: ConfigLoadError };

/**
 * Holds the active rule table behind a single reference.
 *
 * Snapshots are frozen and never edited; `reload` and `addRule` build a new
 * snapshot and swap the reference, so a caller holding the previous one keeps
 * a consistent view for the rest of its work.
 */
export class RuleStore {
  private snapshot: RuleSnapshot;
  private readonly source: string | null;

  constructor(snapshot: RuleSnapshot, source: string | null = null) {
    this.snapshot = snapshot;
    this.source = source;
  }

  static fromFile(source: string): RuleStore {
    return new RuleStore(loadRuleConfig(source), source);
  }

  current(): RuleSnapshot {
    return this.snapshot;
  }

  reload(): ReloadResult {
    if (!this.source) {
      return { ok: false, error: new ConfigLoadError("Rule store has no source to reload from") };
    }

    console.log(`rules: reloading from ${this.source}`);
    try {
      this.snapshot = loadRuleConfig(this.source);
      return { ok: true, snapshot: this.snapshot };
    } catch (error) {
      const loadError =
        error instanceof ConfigLoadError
          ? error
          : new ConfigLoadError(error instanceof Error ? error.message : "Unknown error", this.source);
      console.error("rules: reload failed, keeping previous rules:", loadError.message);
      return { ok: false, error: loadError };
    }
  }

  addRule(raw: unknown): Rule {
    const result = RuleSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigLoadError(`Invalid rule: ${formatIssues(result.error)}`, this.source);
    }

    const rule: Rule = Object.freeze(result.data);
    warnOnInvalidPatterns(rule);

    const rules = new Map(this.snapshot.rules);
    rules.set(rule.name, rule);
    this.snapshot = Object.freeze({ ...this.snapshot, rules, loadedAt: new Date() });

    console.log(`rules: added custom rule "${rule.name}"`);
    return rule;
  }
}
