import { type } from "arktype";
import type { JsonRpcParams, JsonRpcResponse } from "../protocols/jsonrpc/types.js";
import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from "../shared/constants.js";
import { HandshakeError, SpawnError, TransportError } from "../shared/errors.js";
import { log } from "../shared/logging.js";
import { RpcChannel, type CallOptions } from "./channel.js";
import { LineReader } from "./line-reader.js";
import { spawnWithPipes, waitForSpawn, type SpawnProcess, type SpawnedProcess } from "./process.js";

export interface SupervisorOptions {
  command: string;
  args?: readonly string[];
  cwd?: string;
  /** Defaults to the parent's environment. */
  env?: NodeJS.ProcessEnv;
  /** Deadline for every call. Unset means a call waits for as long as the server takes. */
  requestTimeoutMs?: number;
  /** Deadline for the best-effort `shutdown` request sent by `stop()`. */
  shutdownTimeoutMs?: number;
  spawn?: SpawnProcess;
}

export const InitializeResultSchema = type({
  "protocolVersion?": "string",
  serverInfo: {
    name: "string",
    "version?": "string",
  },
});

export type InitializeResult = typeof InitializeResultSchema.infer;
export type ServerInfo = InitializeResult["serverInfo"];

interface Session {
  child: SpawnedProcess;
  reader: LineReader;
  channel: RpcChannel;
}

/**
 * Owns one server process for the lifetime of a client session:
 * spawn + `initialize` handshake, calls over its stdio, then `shutdown` + terminate.
 * Every `start()` must be paired with `stop()`; nothing cleans up on exit.
 */
export class ProcessSupervisor {
  private session: Session | null = null;
  private info: InitializeResult | null = null;
  private readonly spawnProcess: SpawnProcess;

  constructor(private readonly options: SupervisorOptions) {
    this.spawnProcess = options.spawn ?? spawnWithPipes;
  }

  get running(): boolean {
    return this.session !== null;
  }

  get pid(): number | undefined {
    return this.session?.child.pid;
  }

  /** Set by a successful handshake; cleared by `stop()`. */
  get serverInfo(): ServerInfo | null {
    return this.info?.serverInfo ?? null;
  }

  async start(): Promise<InitializeResult> {
    if (this.session) {
      throw new Error(`Server process already running (pid ${String(this.pid)})`);
    }
    const { command, args = [] } = this.options;
    log.debug(`Spawning server: ${command} ${args.join(" ")}`);

    let child: SpawnedProcess;
    try {
      child = this.spawnProcess({
        command,
        args,
        cwd: this.options.cwd,
        env: this.options.env ?? process.env,
      });
    } catch (err) {
      throw new SpawnError(
        `Failed to start ${command}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    await waitForSpawn(child, command);

    const reader = new LineReader(child.stdout);
    const channel = new RpcChannel(
      { stdin: child.stdin, reader },
      { timeoutMs: this.options.requestTimeoutMs }
    );
    this.attachDiagnostics(child, channel);
    this.session = { child, reader, channel };

    try {
      this.info = await this.handshake(channel);
    } catch (err) {
      await this.stop();
      throw err;
    }
    log.debug({ pid: child.pid, server: this.info.serverInfo }, "Server ready");
    return this.info;
  }

  /** Raw round-trip. Remote errors come back in the response, local faults are thrown. */
  call(method: string, params: JsonRpcParams = {}, options?: CallOptions): Promise<JsonRpcResponse> {
    if (!this.session) {
      return Promise.reject(new TransportError(`Server process is not running; cannot call ${method}`));
    }
    return this.session.channel.call(method, params, options);
  }

  /** Best-effort `shutdown`, then terminate. Safe to call more than once. */
  async stop(): Promise<void> {
    const session = this.session;
    if (!session) return;
    this.session = null;
    this.info = null;

    const { child, reader, channel } = session;
    try {
      await channel.call(
        "shutdown",
        {},
        { timeoutMs: this.options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS }
      );
    } catch (err) {
      log.debug({ err }, "shutdown request failed; terminating anyway");
    }
    channel.close("stopped");
    reader.close();
    child.stdin.end();
    if (child.exitCode === null && child.signalCode === null) {
      child.kill();
    }
    log.debug({ pid: child.pid }, "Server stopped");
  }

  private async handshake(channel: RpcChannel): Promise<InitializeResult> {
    let response: JsonRpcResponse;
    try {
      response = await channel.call("initialize", {});
    } catch (err) {
      throw new HandshakeError(
        `initialize failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    if (response.error) {
      throw new HandshakeError(
        `initialize rejected by server: ${response.error.message} (${response.error.code})`
      );
    }
    const result = InitializeResultSchema(response.result);
    if (result instanceof type.errors) {
      throw new HandshakeError(`initialize result is missing server info: ${result.summary}`);
    }
    return result;
  }

  private attachDiagnostics(child: SpawnedProcess, channel: RpcChannel): void {
    child.stderr.on("data", (chunk: Buffer | string) => {
      log.debug({ stderr: typeof chunk === "string" ? chunk : chunk.toString("utf8") }, "server stderr");
    });
    // Write failures surface through the write callback; without a listener EPIPE would crash the client.
    child.stdin.on("error", (err: Error) => {
      log.debug({ err }, "server stdin error");
    });
    child.on("error", (err: Error) => {
      log.warn({ err }, "server process error");
    });
    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      channel.close("server exited");
      log.debug({ code, signal }, "Server process exited");
    });
  }
}
