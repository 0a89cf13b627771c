import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
  PROTOCOL_FAILURE: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

export type RpcErrorKind =
  | "spawn"
  | "handshake"
  | "transport"
  | "decode"
  | "protocol"
  | "busy"
  | "timeout";

/** Base class for every local fault raised by the stdio client. */
export abstract class RpcClientError extends Error {
  abstract readonly kind: RpcErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The server executable could not be launched. */
export class SpawnError extends RpcClientError {
  readonly kind = "spawn";
}

/** `initialize` failed or did not identify the server. The process has been terminated. */
export class HandshakeError extends RpcClientError {
  readonly kind = "handshake";
}

/** Broken pipe, closed output stream, or a call on a stopped client. The channel is dead. */
export class TransportError extends RpcClientError {
  readonly kind = "transport";
}

/** The response line was not a JSON-RPC 2.0 response. Exactly one line was consumed. */
export class ProtocolDecodeError extends RpcClientError {
  readonly kind = "decode";

  constructor(
    message: string,
    readonly line: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The response did not answer the outstanding request. */
export class ProtocolViolationError extends RpcClientError {
  readonly kind = "protocol";

  constructor(
    readonly expectedId: number,
    readonly receivedId: string | number | null
  ) {
    super(`Response id ${String(receivedId)} does not match request id ${expectedId}`);
  }
}

/** A call was issued while another one was still outstanding. */
export class ChannelBusyError extends RpcClientError {
  readonly kind = "busy";

  constructor(readonly method: string, readonly pendingMethod: string) {
    super(`Cannot call ${method}: ${pendingMethod} is still in flight`);
  }
}

export class RequestTimeoutError extends RpcClientError {
  readonly kind = "timeout";

  constructor(readonly method: string, readonly timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${method}`);
  }
}

/** A configuration file exists but cannot be used. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function isRpcClientError(err: unknown): err is RpcClientError {
  return err instanceof RpcClientError;
}

/** Map a fault to the CLI exit code that reports it. */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof ConfigError) return EXIT.INVALID_ARGS;
  if (!isRpcClientError(err)) return EXIT.GENERIC_ERROR;
  switch (err.kind) {
    case "decode":
    case "protocol":
      return EXIT.PROTOCOL_FAILURE;
    case "busy":
      return EXIT.GENERIC_ERROR;
    default:
      return EXIT.SERVER_FAILURE;
  }
}
