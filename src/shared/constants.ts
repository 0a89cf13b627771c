export const JSONRPC_VERSION = "2.0";

/** Config files probed in order; the first one present wins. */
export const DEFAULT_CONFIG_PATH = "./appsettings.local.json";
export const DEFAULT_FALLBACK_CONFIG_PATH = "./appsettings.json";

export const DEFAULT_SERVER_COMMAND = "dotnet";
export const DEFAULT_SERVER_PROJECT =
  "src/Ews.Code.Analyzer/Ews.Analyzer.McpService/Ews.Analyzer.McpService.csproj";

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 2_000;
export const DEFAULT_MAX_FILES = 500;
export const DEFAULT_AUTH_METHOD = "clientCredential";
