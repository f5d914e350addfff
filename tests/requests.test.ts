import { fileURLToPath } from "node:url";
import type { SupabaseClient } from "@supabase/supabase-js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRulesEngine, type RulesEngine } from "../modules/engine";
import { loadConfig } from "../modules/config";
import {
  handleClassifyRequest,
  handleExtractRequest,
  handleProcessRequest,
} from "../modules/requests";

const shippedRules = fileURLToPath(new URL("../config/invoice_rules.json", import.meta.url));

function fakeSupabase() {
  const upload = vi.fn().mockResolvedValue({ data: { path: "p" }, error: null });
  const insert = vi.fn().mockResolvedValue({ error: null, status: 201 });
  const client = {
    storage: { from: vi.fn(() => ({ upload })) },
    from: vi.fn(() => ({ insert })),
  };
  return { client: client as unknown as SupabaseClient, upload, insert };
}

describe("Request handlers", () => {
  let engine: RulesEngine;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    engine = createRulesEngine(shippedRules);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("handleClassifyRequest", () => {
    it("should classify a known partner", () => {
      const result = handleClassifyRequest(engine, {
        sender: "szamlakuldes@danubiusexpert.hu",
        subject: "Új számla érkezett",
        body: "Összesen: 125.000,50 Ft",
        attachments: [{ filename: "szamla.pdf" }],
      });

      expect(result.excluded).toBe(false);
      expect(result.classification).toEqual({
        partner_name: "Danubius",
        invoice_type: "kiadas_vallalati",
        payment_type: "Vállalati számla",
        folder_path: "invoices/2025/Bejövő",
        confidence: 1,
        matched_patterns: ["email: danubiusexpert.hu", "subject: számla"],
      });
    });

    it("should report an exclusion without classifying", () => {
      const result = handleClassifyRequest(engine, {
        sender: "ebill@telekom.hu",
        subject: "Fizetési emlékeztető",
      });

      expect(result).toEqual({
        excluded: true,
        reason: "Excluded by rule: Telekom reminder (email: ebill@telekom.hu, subject: emlékeztető)",
        classification: null,
      });
    });

    it("should return a null classification for an unknown sender", () => {
      const result = handleClassifyRequest(engine, {
        sender: "hello@unknown.example",
        subject: "Hi",
      });

      expect(result).toEqual({ excluded: false, reason: "", classification: null });
    });

    it("should reject a body without a sender", () => {
      expect(() => handleClassifyRequest(engine, { subject: "x" })).toThrow();
    });
  });

  describe("handleExtractRequest", () => {
    it("should extract HUF, EUR and due date for Google Workspace", () => {
      const result = handleExtractRequest(engine, {
        sender: "payments-noreply@google.com",
        subject: "Your Google Workspace invoice is available",
        attachments: [
          {
            filename: "invoice_5123.pdf",
            text: "Total in HUF 12 751,00 Ft\nTotal in EUR € 32.40\nDue date 04/30/2025",
          },
        ],
      });

      expect(result.classification?.partner_name).toBe("Google Workspace");
      expect(result.attachments).toEqual([
        {
          filename: "invoice_5123.pdf",
          processed: true,
          amount: 12751,
          eur_amount: 32.4,
          due_date: "20250430",
          archive_filename: "20250430_GWS_invoice_5123.pdf",
        },
      ]);
    });

    it("should mark filtered attachments as not processed", () => {
      const result = handleExtractRequest(
        engine,
        {
          sender: "berszamfejtes@office.example",
          subject: "Bérszámfejtés 2025/03",
          attachments: [
            { filename: "Szamfejtolap.pdf", text: "" },
            { filename: "Adoesjarulekbefizetesek.pdf", text: "" },
          ],
        },
        () => new Date(2025, 5, 1)
      );

      expect(result.attachments.map((a) => [a.filename, a.processed])).toEqual([
        ["Szamfejtolap.pdf", false],
        ["Adoesjarulekbefizetesek.pdf", true],
      ]);
      expect(result.attachments[0].archive_filename).toBeNull();
    });

    it("should name the file with today's date when no due date is found", () => {
      const result = handleExtractRequest(
        engine,
        {
          sender: "berszamfejtes@office.example",
          subject: "Bérszámfejtés 2025/03",
          attachments: [{ filename: "Bankiutalasok_03.pdf", text: "" }],
        },
        () => new Date(2025, 5, 1)
      );

      expect(result.attachments).toEqual([
        {
          filename: "Bankiutalasok_03.pdf",
          processed: true,
          amount: null,
          eur_amount: null,
          due_date: "20250601",
          archive_filename: "20250601_BER_Bankiutalasok_03.pdf",
        },
      ]);
    });

    it("should return no attachments for an excluded message", () => {
      const result = handleExtractRequest(engine, {
        sender: "googleworkspace-noreply@google.com",
        subject: "Tips for your team",
        attachments: [{ filename: "promo.pdf", text: "Total in HUF 1 Ft" }],
      });

      expect(result.excluded).toBe(true);
      expect(result.attachments).toEqual([]);
    });
  });

  describe("handleProcessRequest", () => {
    const config = loadConfig({ RETRY_MAX_RETRIES: "0" });

    it("should archive the attachment and append it to the ledger", async () => {
      const { client, upload, insert } = fakeSupabase();

      const outcome = await handleProcessRequest(
        engine,
        {
          id: "msg-7",
          sender: "szamlakuldes@danubiusexpert.hu",
          subject: "Új számla érkezett",
          body: "Összesen: 125.000,50 Ft",
          attachments: [
            {
              filename: "szamla.pdf",
              text: "Fizetési határidő: 2025.03.15",
              content_base64: "JVBERi0xLjQ=",
            },
          ],
        },
        { supabase: client, config }
      );

      expect(outcome).toMatchObject({
        status: "processed",
        attachments: [
          {
            filename: "szamla.pdf",
            status: "archived",
            archive_filename: "20250315_DANU_szamla.pdf",
            archive_link: "invoices/2025/Bejövő/20250315_DANU_szamla.pdf",
            amount: 125000.5,
            eur_amount: null,
            due_date: "20250315",
          },
        ],
      });
      expect(upload.mock.calls[0][0]).toBe("invoices/2025/Bejövő/20250315_DANU_szamla.pdf");
      expect(Buffer.from(upload.mock.calls[0][1]).toString("latin1")).toBe("%PDF-1.4");
      expect(insert.mock.calls[0][0]).toMatchObject({
        message_id: "msg-7",
        ledger_date: "2025-03-15",
        amount_huf: 125000.5,
        note: "Könyvelési díj",
        worksheet_name: "2025",
        target_column: "Kiadás HUF",
      });
    });

    it("should write nothing for an excluded message", async () => {
      const { client, upload, insert } = fakeSupabase();

      const outcome = await handleProcessRequest(
        engine,
        {
          sender: "news@vendor.example",
          subject: "Havi hírlevél",
          attachments: [{ filename: "news.pdf", content_base64: "JVBERi0xLjQ=" }],
        },
        { supabase: client, config }
      );

      expect(outcome).toEqual({
        status: "excluded",
        reason: "Excluded by rule: Newsletter (subject: hírlevél)",
      });
      expect(upload).not.toHaveBeenCalled();
      expect(insert).not.toHaveBeenCalled();
    });

    it("should require attachment content", async () => {
      const { client } = fakeSupabase();

      await expect(
        handleProcessRequest(
          engine,
          { sender: "a@b.c", subject: "s", attachments: [{ filename: "x.pdf" }] },
          { supabase: client, config }
        )
      ).rejects.toThrow();
    });
  });
});
