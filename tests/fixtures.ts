import { parseRuleConfig, type RuleSnapshot } from "../modules/rules";

export const danubiusRule = {
  name: "Danubius",
  email_patterns: ["danubiusexpert.hu"],
  invoice_type: "kiadas_vallalati",
  payment_type: "Vállalati számla",
  filename_prefix: "DANU",
  sheet_description: "Könyvelési díj",
  amount_extraction: {
    method: "both",
    email_patterns: ["Összesen:\\s*([\\d.,]+)\\s*Ft"],
    pdf_patterns: ["Fizetendő:\\s*([\\d .,]+?)\\s*Ft"],
  },
  due_date_extraction: {
    pdf_patterns: ["Határidő:\\s*(\\d{4})\\.(\\d{2})\\.(\\d{2})"],
  },
};

export const settings = {
  base_folder: "/archive",
  current_year: 2025,
  folder_structure: {
    kiadas_vallalati: "Bejövő",
    kiadas_penztár: "Pénztár",
    berszamfejtes: "Bérszámfejtés",
  },
  google_sheets: {
    spreadsheet_id: "sheet-1",
    worksheet_template: "Könyvelés {year}",
    columns: { kiadas_penztár: { target: "Pénztár HUF" } },
  },
};

export function makeConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    rules: [danubiusRule],
    exclusion_rules: [],
    settings,
    ...overrides,
  };
}

export function makeSnapshot(overrides: Record<string, unknown> = {}): RuleSnapshot {
  return parseRuleConfig(makeConfig(overrides));
}
