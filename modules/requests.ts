import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { buildArchiveFilename, shouldProcessAttachment, todayStamp, UNKNOWN_PREFIX } from "./archive";
import type { Classification } from "./classifier";
import { retryOptions, type AppConfig } from "./config";
import type { Attachment, RulesEngine } from "./engine";
import { SupabaseLedgerWriter } from "./ledger";
import { processMessage, type MessageOutcome } from "./pipeline";
import { SupabaseStorageArchiver } from "./storage";

export const ClassifyRequestSchema = z.object({
  id: z.string().optional(),
  sender: z.string(),
  subject: z.string(),
  body: z.string().default(""),
  attachments: z.array(z.object({ filename: z.string().min(1) })).default([]),
});

export const ExtractRequestSchema = ClassifyRequestSchema.extend({
  attachments: z
    .array(
      z.object({
        filename: z.string().min(1),
        text: z.string().default(""),
      })
    )
    .default([]),
});

export const ProcessRequestSchema = ClassifyRequestSchema.extend({
  attachments: z
    .array(
      z.object({
        filename: z.string().min(1),
        text: z.string().default(""),
        content_base64: z.string().min(1),
      })
    )
    .default([]),
});

export interface ClassifyResponse {
  excluded: boolean;
  reason: string;
  classification: Classification | null;
}

export interface AttachmentExtraction {
  filename: string;
  processed: boolean;
  amount: number | null;
  eur_amount: number | null;
  due_date: string | null;
  archive_filename: string | null;
}

export interface ExtractResponse extends ClassifyResponse {
  attachments: AttachmentExtraction[];
}

export function handleClassifyRequest(engine: RulesEngine, body: unknown): ClassifyResponse {
  const message = ClassifyRequestSchema.parse(body);
  const rules = engine.view();

  const exclusion = rules.isExcluded(message);
  if (exclusion.excluded) {
    return { excluded: true, reason: exclusion.reason, classification: null };
  }

  return { excluded: false, reason: "", classification: rules.classify(message) };
}

/**
 * Dry run of the intake for one message: classification plus the values
 * each attachment would be archived and logged with. Nothing is written.
 * A missing due date falls back to today, as in the pipeline.
 */
export function handleExtractRequest(
  engine: RulesEngine,
  body: unknown,
  now: () => Date = () => new Date()
): ExtractResponse {
  const message = ExtractRequestSchema.parse(body);
  const rules = engine.view();

  const exclusion = rules.isExcluded(message);
  if (exclusion.excluded) {
    return { excluded: true, reason: exclusion.reason, classification: null, attachments: [] };
  }

  const classification = rules.classify(message);
  if (!classification) {
    return { excluded: false, reason: "", classification: null, attachments: [] };
  }

  const rule = rules.ruleFor(classification);
  const attachments = message.attachments.map((attachment): AttachmentExtraction => {
    if (!shouldProcessAttachment(rule, attachment.filename)) {
      return {
        filename: attachment.filename,
        processed: false,
        amount: null,
        eur_amount: null,
        due_date: null,
        archive_filename: null,
      };
    }

    const dueDate = rules.extractDueDate(attachment.text, classification) ?? todayStamp(now());
    return {
      filename: attachment.filename,
      processed: true,
      amount: rules.extractAmount(message, attachment.text, classification),
      eur_amount: rules.extractEurAmount(attachment.text, classification),
      due_date: dueDate,
      archive_filename: buildArchiveFilename(
        dueDate,
        rule?.filename_prefix ?? UNKNOWN_PREFIX,
        attachment.filename
      ),
    };
  });

  return { excluded: false, reason: "", classification, attachments };
}

export interface ProcessServices {
  supabase: SupabaseClient;
  config: AppConfig;
  now?: () => Date;
}

/** Full intake for one message: archive to storage and append to the ledger. */
export async function handleProcessRequest(
  engine: RulesEngine,
  body: unknown,
  services: ProcessServices
): Promise<MessageOutcome> {
  const message = ProcessRequestSchema.parse(body);
  const { supabase, config } = services;
  const rules = engine.view();

  const texts = new Map<Attachment, string>();
  const contents = new Map<Attachment, Uint8Array>();
  for (const attachment of message.attachments) {
    texts.set(attachment, attachment.text);
    contents.set(attachment, Buffer.from(attachment.content_base64, "base64"));
  }

  return processMessage(rules, message, {
    pdfText: { extractText: async (_message, attachment) => texts.get(attachment) ?? "" },
    archiver: new SupabaseStorageArchiver(supabase, config.ARCHIVE_BUCKET, (request) =>
      contents.get(request.attachment)
    ),
    ledger: new SupabaseLedgerWriter(supabase, rules.snapshot.settings, config.LEDGER_TABLE),
    retry: retryOptions(config),
    now: services.now,
  });
}
