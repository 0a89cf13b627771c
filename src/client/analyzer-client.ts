/**
 * Named operations of the EWS migration analyzer server. Each one is a fixed
 * method name plus argument shaping; it returns the `result` member of the
 * response and drops any `error` member. Use `call()` when the error matters.
 */

import path from "node:path";
import { type } from "arktype";
import type { JsonRpcParams, JsonRpcResponse } from "../protocols/jsonrpc/types.js";
import { DEFAULT_AUTH_METHOD, DEFAULT_MAX_FILES } from "../shared/constants.js";
import { isRecord } from "../shared/guards.js";
import { log } from "../shared/logging.js";
import type { CallOptions } from "./channel.js";
import { ProcessSupervisor, type InitializeResult, type SupervisorOptions } from "./supervisor.js";
import {
  PromptDescriptorSchema,
  ResourceDescriptorSchema,
  ToolDescriptorSchema,
  type AuthMethod,
  type ConversionTier,
  type GraphPromptRequest,
  type PromptDescriptor,
  type ResourceDescriptor,
  type ToolDescriptor,
  type ToolResult,
} from "./types.js";

function resultOf(method: string, response: JsonRpcResponse): ToolResult {
  if (response.error) {
    log.debug({ method, error: response.error }, "server returned an error; result is empty");
  }
  return isRecord(response.result) ? response.result : {};
}

function listOf<T>(result: ToolResult, key: string, accept: (entry: unknown) => entry is T): T[] {
  const entries = result[key];
  return Array.isArray(entries) ? entries.filter(accept) : [];
}

const isToolEntry = (entry: unknown): entry is typeof ToolDescriptorSchema.infer =>
  !(ToolDescriptorSchema(entry) instanceof type.errors);
const isResourceEntry = (entry: unknown): entry is ResourceDescriptor =>
  !(ResourceDescriptorSchema(entry) instanceof type.errors);
const isPromptEntry = (entry: unknown): entry is PromptDescriptor =>
  !(PromptDescriptorSchema(entry) instanceof type.errors);

export class EwsAnalyzerClient {
  readonly supervisor: ProcessSupervisor;

  constructor(options: SupervisorOptions | ProcessSupervisor) {
    this.supervisor = options instanceof ProcessSupervisor ? options : new ProcessSupervisor(options);
  }

  start(): Promise<InitializeResult> {
    return this.supervisor.start();
  }

  stop(): Promise<void> {
    return this.supervisor.stop();
  }

  /** Full response, including any remote `error` member. */
  call(method: string, params: JsonRpcParams = {}, options?: CallOptions): Promise<JsonRpcResponse> {
    return this.supervisor.call(method, params, options);
  }

  async callTool(name: string, args: JsonRpcParams = {}): Promise<ToolResult> {
    const response = await this.supervisor.call("tools/call", { name, arguments: args });
    return resultOf(name, response);
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const response = await this.supervisor.call("tools/list", {});
    return listOf(resultOf("tools/list", response), "tools", isToolEntry).map((tool) => ({
      name: tool.name,
      description: tool.description ?? "",
      ...(tool.inputSchema !== undefined && { inputSchema: tool.inputSchema }),
    }));
  }

  analyzeCode(code: string): Promise<ToolResult> {
    return this.callTool("analyzeCode", { sources: [{ code }] });
  }

  analyzeFile(filePath: string): Promise<ToolResult> {
    return this.callTool("analyzeFile", { path: path.resolve(filePath) });
  }

  convertToGraph(code: string, tier?: ConversionTier): Promise<ToolResult> {
    return this.callTool("convertToGraph", { code, ...(tier !== undefined && { tier }) });
  }

  convertAuth(code: string, authMethod: AuthMethod = DEFAULT_AUTH_METHOD): Promise<ToolResult> {
    return this.callTool("convertAuth", { code, authMethod });
  }

  getRoadmap(sdkQualifiedName: string): Promise<ToolResult> {
    return this.callTool("getRoadmap", { sdkQualifiedName });
  }

  /** Roadmap keyed by SOAP operation name (e.g. "FindItem") instead of SDK member. */
  getRoadmapForOperation(ewsOperation: string): Promise<ToolResult> {
    return this.callTool("getRoadmap", { ewsOperation });
  }

  /** Registers `rootPath` with the server's allowlist first. */
  async getMigrationReadiness(rootPath: string, maxFiles = DEFAULT_MAX_FILES): Promise<ToolResult> {
    await this.addAllowedPath(rootPath);
    return this.callTool("getMigrationReadiness", { rootPath: path.resolve(rootPath), maxFiles });
  }

  addAllowedPath(dirPath: string): Promise<ToolResult> {
    return this.callTool("addAllowedPath", { path: path.resolve(dirPath) });
  }

  listAllowedPaths(): Promise<ToolResult> {
    return this.callTool("listAllowedPaths", {});
  }

  /**
   * Toggles the server's own verbose logging (written to its stderr).
   * With verbose on, the server also writes `events/partialResult` notifications to
   * stdout during project analysis. This client does not read notifications: such a
   * line fails the pending call as a decode error and the next call then sees an id
   * mismatch, which retires the channel.
   */
  setLogging(verbose: boolean): Promise<ToolResult> {
    return this.callTool("setLogging", { verbose });
  }

  generateGraphPrompt({ sdkQualifiedName, surroundingCode, goal }: GraphPromptRequest): Promise<ToolResult> {
    return this.callTool("generateGraphPrompt", {
      sdkQualifiedName,
      ...(surroundingCode !== undefined && { surroundingCode }),
      ...(goal !== undefined && { goal }),
    });
  }

  async listResources(): Promise<ResourceDescriptor[]> {
    const response = await this.supervisor.call("resources/list", {});
    return listOf(resultOf("resources/list", response), "resources", isResourceEntry);
  }

  async readResource(uri: string): Promise<ToolResult> {
    return resultOf("resources/read", await this.supervisor.call("resources/read", { uri }));
  }

  async listPrompts(): Promise<PromptDescriptor[]> {
    const response = await this.supervisor.call("prompts/list", {});
    return listOf(resultOf("prompts/list", response), "prompts", isPromptEntry);
  }

  async getPrompt(name: string, args: Record<string, string> = {}): Promise<ToolResult> {
    return resultOf("prompts/get", await this.supervisor.call("prompts/get", { name, arguments: args }));
  }
}

/** Start a client, run `fn`, and stop the client on every exit path. */
export async function withAnalyzerClient<T>(
  options: SupervisorOptions | ProcessSupervisor,
  fn: (client: EwsAnalyzerClient, server: InitializeResult) => Promise<T>
): Promise<T> {
  const client = new EwsAnalyzerClient(options);
  const server = await client.start();
  try {
    return await fn(client, server);
  } finally {
    await client.stop();
  }
}
