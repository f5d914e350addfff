import { buildArchiveFilename, shouldProcessAttachment, todayStamp, UNKNOWN_PREFIX } from "./archive";
import type { Classification } from "./classifier";
import { RuleView, type Attachment, type IncomingMessage, type RulesEngine } from "./engine";
import type { LedgerWriter } from "./ledger";
import { withRetry, type RetryOptions } from "./retry";

export interface PdfTextSource {
  extractText(message: IncomingMessage, attachment: Attachment): Promise<string>;
}

export interface ArchiveRequest {
  message: IncomingMessage;
  attachment: Attachment;
  folderPath: string;
  filename: string;
}

export interface Archiver {
  /** Returns a link or path to the archived copy. */
  archive(request: ArchiveRequest): Promise<string>;
}

export interface PipelineDeps {
  pdfText: PdfTextSource;
  archiver: Archiver;
  ledger: LedgerWriter;
  retry?: RetryOptions;
  now?: () => Date;
}

export type AttachmentOutcome =
  | { filename: string; status: "skipped" }
  | {
      filename: string;
      status: "archived";
      archive_filename: string;
      archive_link: string;
      amount: number | null;
      eur_amount: number | null;
      due_date: string;
    }
  | { filename: string; status: "failed"; error: string };

export type MessageOutcome =
  | { status: "excluded"; reason: string }
  | { status: "unmatched" }
  | { status: "processed"; classification: Classification; attachments: AttachmentOutcome[] };

async function processAttachment(
  rules: RuleView,
  message: IncomingMessage,
  attachment: Attachment,
  classification: Classification,
  deps: PipelineDeps
): Promise<AttachmentOutcome> {
  const rule = rules.ruleFor(classification);
  const now = deps.now ?? (() => new Date());

  const pdfText = await deps.pdfText.extractText(message, attachment);
  const amount = rules.extractAmount(message, pdfText, classification);
  const eurAmount = rules.extractEurAmount(pdfText, classification);
  const dueDate = rules.extractDueDate(pdfText, classification) ?? todayStamp(now());

  const archiveFilename = buildArchiveFilename(
    dueDate,
    rule?.filename_prefix ?? UNKNOWN_PREFIX,
    attachment.filename
  );

  const archiveLink = await withRetry(
    () =>
      deps.archiver.archive({
        message,
        attachment,
        folderPath: classification.folder_path,
        filename: archiveFilename,
      }),
    deps.retry
  );

  await withRetry(
    () =>
      deps.ledger.append({
        message_id: message.id ?? null,
        sender: message.sender,
        subject: message.subject,
        partner_name: classification.partner_name,
        invoice_type: classification.invoice_type,
        payment_type: classification.payment_type,
        pdf_filename: archiveFilename,
        archive_link: archiveLink,
        amount,
        eur_amount: eurAmount,
        due_date: dueDate,
        sheet_description: rule?.sheet_description ?? "",
      }),
    deps.retry
  );

  return {
    filename: attachment.filename,
    status: "archived",
    archive_filename: archiveFilename,
    archive_link: archiveLink,
    amount,
    eur_amount: eurAmount,
    due_date: dueDate,
  };
}

/**
 * Exclusion → classification → per-attachment extraction, archive and
 * ledger append. Excluded and unmatched messages cause no side effects.
 * The whole message is handled against one rule snapshot; pass a view to
 * pin it, or an engine to take the current one.
 */
export async function processMessage(
  engine: RulesEngine | RuleView,
  message: IncomingMessage,
  deps: PipelineDeps
): Promise<MessageOutcome> {
  const rules = engine instanceof RuleView ? engine : engine.view();

  const exclusion = rules.isExcluded(message);
  if (exclusion.excluded) {
    console.log(`pipeline: ${exclusion.reason}`);
    return { status: "excluded", reason: exclusion.reason };
  }

  const classification = rules.classify(message);
  if (!classification) {
    console.log(`pipeline: no matching rule for message from ${message.sender}`);
    return { status: "unmatched" };
  }

  const rule = rules.ruleFor(classification);
  const attachments: AttachmentOutcome[] = [];

  for (const attachment of message.attachments) {
    if (!shouldProcessAttachment(rule, attachment.filename)) {
      console.log(`pipeline: skipped attachment (filename filter): ${attachment.filename}`);
      attachments.push({ filename: attachment.filename, status: "skipped" });
      continue;
    }

    try {
      attachments.push(await processAttachment(rules, message, attachment, classification, deps));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      console.error(`pipeline: failed to process ${attachment.filename}:`, error);
      attachments.push({ filename: attachment.filename, status: "failed", error: errorMessage });
    }
  }

  return { status: "processed", classification, attachments };
}
