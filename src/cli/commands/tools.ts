import { type } from "arktype";
import type { EwsAnalyzerClient } from "../../client/analyzer-client.js";
import type { AuthMethod, ConversionTier, GraphPromptRequest } from "../../client/types.js";
import { DEFAULT_AUTH_METHOD, DEFAULT_MAX_FILES } from "../../shared/constants.js";
import { EXIT, exit } from "../../shared/errors.js";
import { printJson } from "../utils.js";

const AuthMethodSchema = type("'clientCredential' | 'interactive' | 'deviceCode' | 'managedIdentity'");
const TierSchema = type("1 | 2 | 3");

// Flag parsers run before the server is started so bad input never spawns it.

export function parseAuthMethod(value: string | undefined): AuthMethod {
  if (value === undefined) return DEFAULT_AUTH_METHOD;
  const parsed = AuthMethodSchema(value);
  if (parsed instanceof type.errors) exit(EXIT.INVALID_ARGS, `--auth-method ${parsed.summary}`);
  return parsed;
}

export function parseTier(value: string | undefined): ConversionTier | undefined {
  if (value === undefined) return undefined;
  const parsed = TierSchema(Number(value));
  if (parsed instanceof type.errors) exit(EXIT.INVALID_ARGS, `--tier ${parsed.summary}`);
  return parsed;
}

export function parseMaxFiles(value: string | undefined): number {
  if (value === undefined) return DEFAULT_MAX_FILES;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    exit(EXIT.INVALID_ARGS, `--max-files must be a positive integer, got "${value}"`);
  }
  return n;
}

export async function runTools(client: EwsAnalyzerClient): Promise<void> {
  for (const tool of await client.listTools()) {
    process.stdout.write(`  ${tool.name.padEnd(25)} ${tool.description}\n`);
  }
}

export type AnalyzeTarget = { code: string } | { file: string };

export async function runAnalyze(client: EwsAnalyzerClient, target: AnalyzeTarget): Promise<void> {
  printJson("code" in target ? await client.analyzeCode(target.code) : await client.analyzeFile(target.file));
}

export async function runConvert(
  client: EwsAnalyzerClient,
  code: string,
  tier: ConversionTier | undefined
): Promise<void> {
  printJson(await client.convertToGraph(code, tier));
}

export async function runConvertAuth(
  client: EwsAnalyzerClient,
  code: string,
  authMethod: AuthMethod
): Promise<void> {
  printJson(await client.convertAuth(code, authMethod));
}

export async function runRoadmap(
  client: EwsAnalyzerClient,
  name: string,
  bySoapOperation: boolean
): Promise<void> {
  printJson(bySoapOperation ? await client.getRoadmapForOperation(name) : await client.getRoadmap(name));
}

export async function runReadiness(
  client: EwsAnalyzerClient,
  root: string,
  maxFiles: number
): Promise<void> {
  printJson(await client.getMigrationReadiness(root, maxFiles));
}

export async function runAllow(client: EwsAnalyzerClient, dir: string): Promise<void> {
  printJson(await client.addAllowedPath(dir));
}

export async function runAllowed(client: EwsAnalyzerClient): Promise<void> {
  printJson(await client.listAllowedPaths());
}

export async function runPrompt(client: EwsAnalyzerClient, request: GraphPromptRequest): Promise<void> {
  printJson(await client.generateGraphPrompt(request));
}
