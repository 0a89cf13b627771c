import { type } from "arktype";
import { ProtocolDecodeError } from "../../shared/errors.js";
import { parseJsonRpcLine } from "./codec.js";
import { JsonRpcResponseSchema, type JsonRpcResponse } from "./types.js";

export function parseResponse(data: unknown): JsonRpcResponse {
  const result = JsonRpcResponseSchema(data);
  if (result instanceof type.errors) {
    throw new Error(`Invalid JSON-RPC response: ${result.summary}`);
  }
  const hasResult = "result" in result;
  const hasError = "error" in result;
  if (hasResult === hasError) {
    throw new Error("Invalid JSON-RPC response: exactly one of result or error must be present");
  }
  return result;
}

/** Decode one line read from the server into a response. */
export function decodeResponseLine(line: string): JsonRpcResponse {
  if (!line.trim()) {
    throw new ProtocolDecodeError("Response line is empty", line);
  }
  let data: unknown;
  try {
    data = parseJsonRpcLine(line);
  } catch (err) {
    throw new ProtocolDecodeError(`Response is not valid JSON: ${preview(line)}`, line, { cause: err });
  }
  try {
    return parseResponse(data);
  } catch (err) {
    throw new ProtocolDecodeError(err instanceof Error ? err.message : String(err), line, {
      cause: err,
    });
  }
}

export function isErrorResponse(
  msg: JsonRpcResponse
): msg is JsonRpcResponse & { error: NonNullable<JsonRpcResponse["error"]> } {
  return msg.error !== undefined;
}

function preview(line: string): string {
  return line.length > 80 ? `${line.slice(0, 80)}…` : line;
}
