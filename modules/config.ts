import { z } from "zod";
import type { RetryOptions } from "./retry";

export const EnvSchema = z.object({
  RULES_FILE: z.string().min(1).default("config/invoice_rules.json"),
  LEDGER_TABLE: z.string().min(1).default("invoice_ledger"),
  ARCHIVE_BUCKET: z.string().min(1).default("invoice-archive"),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  RETRY_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${details}`);
  }
  return result.data;
}

export function requireSupabaseCredentials(config: AppConfig): { url: string; key: string } {
  if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
    throw new ConfigError("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for ledger writes");
  }
  return { url: config.SUPABASE_URL, key: config.SUPABASE_SERVICE_ROLE_KEY };
}

export function retryOptions(config: AppConfig): RetryOptions {
  return {
    maxRetries: config.RETRY_MAX_RETRIES,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
  };
}
