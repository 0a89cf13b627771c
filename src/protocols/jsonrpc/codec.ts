/**
 * JSON-RPC codec for newline-delimited JSON over stdio.
 */

import { JSONRPC_VERSION } from "../../shared/constants.js";
import type { JsonRpcParams, JsonRpcRequest } from "./types.js";

export function buildRequest(id: number, method: string, params: JsonRpcParams): JsonRpcRequest {
  return { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function parseJsonRpcLine(line: string): unknown {
  const trimmed = line.trim();
  if (!trimmed) return null;
  return JSON.parse(trimmed) as unknown;
}

/** One JSON document plus the newline terminator. JSON.stringify escapes newlines inside strings. */
export function serializeJsonRpc(obj: unknown): string {
  return JSON.stringify(obj) + "\n";
}
