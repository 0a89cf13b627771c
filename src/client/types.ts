import { type } from "arktype";

export const ToolDescriptorSchema = type({
  name: "string",
  "description?": "string",
  "inputSchema?": "unknown",
});

/** Display form of a tool advertised by `tools/list`. */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema?: unknown;
}

export const ResourceDescriptorSchema = type({
  uri: "string",
  "name?": "string",
  "description?": "string",
  "mimeType?": "string",
});
export type ResourceDescriptor = typeof ResourceDescriptorSchema.infer;

export const PromptDescriptorSchema = type({
  name: "string",
  "description?": "string",
  "arguments?": "unknown[]",
});
export type PromptDescriptor = typeof PromptDescriptorSchema.infer;

/** Result portion of a tools/call response; its shape belongs to the server. */
export type ToolResult = Record<string, unknown>;

/** Target flows accepted by convertAuth. */
export type AuthMethod = "clientCredential" | "interactive" | "deviceCode" | "managedIdentity";

/** 1 = deterministic, 2 = template-guided LLM, 3 = full-context LLM. */
export type ConversionTier = 1 | 2 | 3;

export interface GraphPromptRequest {
  sdkQualifiedName: string;
  surroundingCode?: string;
  goal?: string;
}
