import { type } from "arktype";

export const JsonRpcErrorSchema = type({
  code: "number",
  message: "string",
  "data?": "unknown",
});

export const JsonRpcRequestSchema = type({
  jsonrpc: "'2.0'",
  id: "number",
  method: "string",
  params: "unknown",
});

/** `id` may be null when the server could not read the request id. */
export const JsonRpcResponseSchema = type({
  jsonrpc: "'2.0'",
  id: "string | number | null",
  "result?": "unknown",
  "error?": JsonRpcErrorSchema,
});

export type JsonRpcParams = Record<string, unknown>;
export type JsonRpcError = typeof JsonRpcErrorSchema.infer;
export type JsonRpcRequest = typeof JsonRpcRequestSchema.infer;
export type JsonRpcResponse = typeof JsonRpcResponseSchema.infer;
