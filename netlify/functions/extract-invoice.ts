import type { Handler } from "@netlify/functions";
import { ConfigError, loadConfig } from "../../modules/config";
import { getSharedEngine } from "../../modules/engine";
import { ConfigLoadError } from "../../modules/rules";
import { handleExtractRequest } from "../../modules/requests";

export const handler: Handler = async (event) => {
  if (event.httpMethod !== "POST") {
    return {
      statusCode: 405,
      body: JSON.stringify({ error: "Method not allowed" }),
    };
  }

  try {
    const engine = getSharedEngine(loadConfig().RULES_FILE);
    const body: unknown = JSON.parse(event.body || "{}");
    const output = handleExtractRequest(engine, body);

    return {
      statusCode: 200,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(output),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error("extract-invoice error:", error);
    const isConfigFault = error instanceof ConfigLoadError || error instanceof ConfigError;
    return {
      statusCode: isConfigFault ? 500 : 400,
      body: JSON.stringify({ error: message }),
    };
  }
};
