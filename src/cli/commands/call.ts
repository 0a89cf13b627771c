import type { EwsAnalyzerClient } from "../../client/analyzer-client.js";
import type { JsonRpcParams } from "../../protocols/jsonrpc/types.js";
import { EXIT, exit } from "../../shared/errors.js";
import { isRecord } from "../../shared/guards.js";
import { printJson } from "../utils.js";

export function parseParams(raw: string | undefined): JsonRpcParams {
  if (raw === undefined) return {};
  let value: unknown;
  try {
    value = JSON.parse(raw) as unknown;
  } catch (err) {
    exit(EXIT.INVALID_ARGS, `params must be JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(value)) exit(EXIT.INVALID_ARGS, "params must be a JSON object");
  return value;
}

/** Print the full response, `error` member included. */
export async function runCall(
  client: EwsAnalyzerClient,
  method: string,
  params: JsonRpcParams
): Promise<void> {
  printJson(await client.call(method, params));
}
