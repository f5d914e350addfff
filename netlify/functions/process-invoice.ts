import type { Handler } from "@netlify/functions";
import { ZodError } from "zod";
import { loadConfig } from "../../modules/config";
import { getSharedEngine } from "../../modules/engine";
import { handleProcessRequest } from "../../modules/requests";
import { createLedgerClient } from "../../src/lib/supabase";

export const handler: Handler = async (event) => {
  if (event.httpMethod !== "POST") {
    return {
      statusCode: 405,
      body: JSON.stringify({ error: "Method not allowed" }),
    };
  }

  try {
    const config = loadConfig();
    const engine = getSharedEngine(config.RULES_FILE);
    const body: unknown = JSON.parse(event.body || "{}");
    const outcome = await handleProcessRequest(engine, body, {
      supabase: createLedgerClient(config),
      config,
    });

    return {
      statusCode: 200,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(outcome),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error("process-invoice error:", error);
    const isBadInput = error instanceof ZodError || error instanceof SyntaxError;
    return {
      statusCode: isBadInput ? 400 : 500,
      body: JSON.stringify({ error: message }),
    };
  }
};
