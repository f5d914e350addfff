import type { Handler } from "@netlify/functions";
import { loadConfig } from "../../modules/config";
import { getSharedEngine } from "../../modules/engine";

export const handler: Handler = async (event) => {
  if (event.httpMethod !== "POST") {
    return {
      statusCode: 405,
      body: JSON.stringify({ error: "Method not allowed" }),
    };
  }

  try {
    const result = getSharedEngine(loadConfig().RULES_FILE).reload();
    if (!result.ok) {
      return {
        statusCode: 500,
        body: JSON.stringify({ error: result.error.message }),
      };
    }

    return {
      statusCode: 200,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        rules: result.snapshot.rules.size,
        exclusion_rules: result.snapshot.exclusionRules.length,
        loaded_at: result.snapshot.loadedAt.toISOString(),
      }),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    console.error("reload-rules error:", error);
    return {
      statusCode: 500,
      body: JSON.stringify({ error: message }),
    };
  }
};
