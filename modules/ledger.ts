import type { SupabaseClient } from "@supabase/supabase-js";
import type { InvoiceType, Settings } from "./rules";

export const DEFAULT_TARGET_COLUMN = "Kiadás HUF";

export interface SheetsTarget {
  spreadsheet_id: string | null;
  worksheet_name: string;
  target_column: string;
}

export function sheetsTarget(
  settings: Settings,
  invoiceType: InvoiceType,
  year: number = settings.current_year ?? new Date().getFullYear()
): SheetsTarget {
  const sheets = settings.google_sheets;
  return {
    spreadsheet_id: sheets?.spreadsheet_id ?? null,
    worksheet_name: (sheets?.worksheet_template ?? "{year}").replace(/\{year\}/g, String(year)),
    target_column: sheets?.columns[invoiceType]?.target ?? DEFAULT_TARGET_COLUMN,
  };
}

export interface LedgerEntry {
  message_id: string | null;
  sender: string;
  subject: string;
  partner_name: string;
  invoice_type: InvoiceType;
  payment_type: string;
  pdf_filename: string;
  archive_link: string;
  amount: number | null;
  eur_amount: number | null;
  due_date: string | null;
  sheet_description: string;
}

export type LedgerCell = string | number;

/**
 * Columns: Dátum, Fizetve, Bevétel HUF, Kiadás HUF, Bevétel EUR,
 * Kiadás EUR, Megjegyzés, Link a számlára, spare.
 */
export type LedgerRow = [
  string,
  string,
  "",
  LedgerCell,
  "",
  LedgerCell,
  string,
  string,
  "",
];

function isoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function ledgerDate(dueDate: string | null, now: Date = new Date()): string {
  const match = dueDate ? /^(\d{4})(\d{2})(\d{2})$/.exec(dueDate) : null;
  if (!match) return isoDate(now);

  const [, year, month, day] = match;
  const parsed = new Date(Number(year), Number(month) - 1, Number(day));
  if (parsed.getMonth() !== Number(month) - 1 || parsed.getDate() !== Number(day)) {
    return isoDate(now);
  }
  return `${year}-${month}-${day}`;
}

export function ledgerNote(entry: Pick<LedgerEntry, "sheet_description" | "pdf_filename" | "sender">): string {
  return entry.sheet_description || `Email: ${entry.pdf_filename} from ${entry.sender}`;
}

export function buildLedgerRow(entry: LedgerEntry, now: Date = new Date()): LedgerRow {
  return [
    ledgerDate(entry.due_date, now),
    entry.payment_type,
    "",
    entry.amount ? Math.trunc(entry.amount) : "",
    "",
    entry.eur_amount ? entry.eur_amount : "",
    ledgerNote(entry),
    entry.archive_link,
    "",
  ];
}

export interface LedgerWriter {
  append(entry: LedgerEntry): Promise<void>;
}

export class LedgerWriteError extends Error {
  status: number | null;
  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "LedgerWriteError";
    this.status = status;
  }
}

export class SupabaseLedgerWriter implements LedgerWriter {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly settings: Settings,
    private readonly table: string = "invoice_ledger"
  ) {}

  async append(entry: LedgerEntry): Promise<void> {
    const target = sheetsTarget(this.settings, entry.invoice_type);
    const row = buildLedgerRow(entry);

    const { error, status } = await this.supabase.from(this.table).insert({
      message_id: entry.message_id,
      partner_name: entry.partner_name,
      invoice_type: entry.invoice_type,
      payment_type: entry.payment_type,
      ledger_date: row[0],
      amount_huf: entry.amount,
      amount_eur: entry.eur_amount,
      note: row[6],
      archive_link: entry.archive_link,
      pdf_filename: entry.pdf_filename,
      sender_email: entry.sender,
      subject: entry.subject,
      worksheet_name: target.worksheet_name,
      target_column: target.target_column,
      row_values: row,
    });

    if (error) {
      throw new LedgerWriteError(`Failed to append ledger row: ${error.message}`, status);
    }
    console.log(`ledger: appended ${entry.pdf_filename} to ${target.worksheet_name}`);
  }
}
