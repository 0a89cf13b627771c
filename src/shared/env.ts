/** Environment variable names read by the CLI. */
export const EWS_MCP_ENV = {
  COMMAND: "EWS_MCP_COMMAND",
  PROJECT: "EWS_MCP_PROJECT",
  TIMEOUT_MS: "EWS_MCP_TIMEOUT_MS",
  LOG_LEVEL: "EWS_MCP_LOG_LEVEL",
} as const;

export function getEnv(
  key: keyof typeof EWS_MCP_ENV,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[EWS_MCP_ENV[key]];
  return value ? value : undefined;
}
