import { Command } from "commander";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_FALLBACK_CONFIG_PATH,
} from "../shared/constants.js";
import { getEnv } from "../shared/env.js";
import { EXIT, exit } from "../shared/errors.js";
import { runCall, parseParams } from "./commands/call.js";
import { runDemo } from "./commands/demo.js";
import {
  parseAuthMethod,
  parseMaxFiles,
  parseTier,
  runAllow,
  runAllowed,
  runAnalyze,
  runConvert,
  runConvertAuth,
  runPrompt,
  runReadiness,
  runRoadmap,
  runTools,
} from "./commands/tools.js";
import { getPackageJsonVersion, runClientCommand, type GlobalOptions } from "./utils.js";

export function createProgram(): Command {
  const program = new Command();
  const globals = () => program.opts<GlobalOptions>();

  program
    .name("ews-mcp")
    .description("Client for the EWS migration analyzer MCP server (JSON-RPC over stdio)")
    .version(getPackageJsonVersion())
    .option("--config <path>", "Config file", DEFAULT_CONFIG_PATH)
    .option("--fallback-config <path>", "Config file used when --config is missing", DEFAULT_FALLBACK_CONFIG_PATH)
    .option("--command <cmd>", "Server executable (default: dotnet)")
    .option("--project <path>", "Server project passed to `dotnet run --project`")
    .option("--timeout <ms>", "Per-request timeout in milliseconds (default: none)")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level", getEnv("LOG_LEVEL") ?? "info")
    .option("--log-format <format>", "Log format: text, json or plain", "plain");

  program
    .command("demo")
    .description("List tools, analyze and convert a sample, look up a roadmap")
    .action(() => runClientCommand(globals(), (client) => runDemo(client)));

  program
    .command("tools")
    .description("List the server's tools")
    .action(() => runClientCommand(globals(), (client) => runTools(client)));

  program
    .command("analyze [file]")
    .description("Analyze a C# file, or inline code with --code")
    .option("--code <code>", "Inline source to analyze")
    .action((file: string | undefined, opts: { code?: string }) => {
      const target = opts.code !== undefined ? { code: opts.code } : file !== undefined ? { file } : null;
      if (!target) exit(EXIT.INVALID_ARGS, "analyze needs a file or --code");
      return runClientCommand(globals(), (client) => runAnalyze(client, target));
    });

  program
    .command("convert <code>")
    .description("Convert an EWS call site to Microsoft Graph SDK code")
    .option("--tier <n>", "Force tier 1 (deterministic), 2 (template LLM) or 3 (full-context LLM)")
    .action((code: string, opts: { tier?: string }) => {
      const tier = parseTier(opts.tier);
      return runClientCommand(globals(), (client) => runConvert(client, code, tier));
    });

  program
    .command("convert-auth <code>")
    .description("Convert ExchangeService authentication to GraphServiceClient")
    .option("--auth-method <method>", "clientCredential, interactive, deviceCode or managedIdentity")
    .action((code: string, opts: { authMethod?: string }) => {
      const authMethod = parseAuthMethod(opts.authMethod);
      return runClientCommand(globals(), (client) => runConvertAuth(client, code, authMethod));
    });

  program
    .command("roadmap <name>")
    .description("Migration roadmap for an EWS SDK member (or SOAP operation with --operation)")
    .option("--operation", "Treat <name> as a SOAP operation")
    .action((name: string, opts: { operation?: boolean }) =>
      runClientCommand(globals(), (client) => runRoadmap(client, name, opts.operation === true))
    );

  program
    .command("readiness <root>")
    .description("Migration readiness score for a project (allows <root> first)")
    .option("--max-files <n>", "Max files to scan (default 500)")
    .action((root: string, opts: { maxFiles?: string }) => {
      const maxFiles = parseMaxFiles(opts.maxFiles);
      return runClientCommand(globals(), (client) => runReadiness(client, root, maxFiles));
    });

  program
    .command("allow <path>")
    .description("Add a directory to the server's allowlist")
    .action((dir: string) => runClientCommand(globals(), (client) => runAllow(client, dir)));

  program
    .command("allowed")
    .description("List the server's allowed paths")
    .action(() => runClientCommand(globals(), (client) => runAllowed(client)));

  program
    .command("prompt <sdkQualifiedName>")
    .description("Generate a Graph migration prompt for one EWS usage")
    .option("--context <code>", "Surrounding code")
    .option("--goal <text>", "Migration intent")
    .action((sdkQualifiedName: string, opts: { context?: string; goal?: string }) =>
      runClientCommand(globals(), (client) =>
        runPrompt(client, { sdkQualifiedName, surroundingCode: opts.context, goal: opts.goal })
      )
    );

  program
    .command("call <method> [params]")
    .description("Send a raw JSON-RPC request and print the full response")
    .action((method: string, params: string | undefined) => {
      const parsed = parseParams(params);
      return runClientCommand(globals(), (client) => runCall(client, method, parsed));
    });

  return program;
}
