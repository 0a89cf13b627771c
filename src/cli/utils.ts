import { readFileSync, existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import { withAnalyzerClient, type EwsAnalyzerClient } from "../client/analyzer-client.js";
import type { InitializeResult } from "../client/supervisor.js";
import { loadJsonConfig, parseTimeoutMs, resolveClientSettings } from "../config.js";
import { exit, exitCodeFor } from "../shared/errors.js";
import { initLogger, isLogFormat, log } from "../shared/logging.js";

/** Options declared on the root program, shared by every command. */
export interface GlobalOptions {
  config?: string;
  fallbackConfig?: string;
  command?: string;
  project?: string;
  timeout?: string;
  logLevel?: string;
  logFormat?: string;
  verbose?: boolean;
}

export type ClientAction = (client: EwsAnalyzerClient, server: InitializeResult) => Promise<void>;

export function getPackageJsonVersion(): string {
  const pkgPath = fileURLToPath(new URL("../../package.json", import.meta.url));
  if (!existsSync(pkgPath)) return "0.1.0";
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, "utf8")) as { version?: string };
    return pkg.version ?? "0.1.0";
  } catch (err) {
    log.debug({ err, pkgPath }, "unreadable package.json");
    return "0.1.0";
  }
}

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}

export function printSection(title: string): void {
  process.stdout.write(chalk.bold(`─── ${title} ───`) + "\n");
}

/**
 * Configure logging, resolve settings, run `action` against a started server,
 * and stop the server afterwards. Fatal faults exit with their mapped code.
 */
export async function runClientCommand(opts: GlobalOptions, action: ClientAction): Promise<void> {
  const format = opts.logFormat && isLogFormat(opts.logFormat) ? opts.logFormat : "text";
  initLogger(opts.verbose ? "debug" : (opts.logLevel ?? "info"), format);

  try {
    const loaded = await loadJsonConfig(opts.config, opts.fallbackConfig);
    const settings = resolveClientSettings(loaded, {
      command: opts.command,
      project: opts.project,
      timeoutMs: parseTimeoutMs(opts.timeout, "--timeout"),
    });
    await withAnalyzerClient(settings, async (client, server) => {
      log.info(`Connected to MCP server: ${server.serverInfo.name}`);
      await action(client, server);
    });
  } catch (err) {
    exit(exitCodeFor(err), err instanceof Error ? err.message : String(err));
  }
}
