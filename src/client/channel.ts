import type { Writable } from "node:stream";
import { buildRequest, serializeJsonRpc } from "../protocols/jsonrpc/codec.js";
import type { JsonRpcParams, JsonRpcResponse } from "../protocols/jsonrpc/types.js";
import { decodeResponseLine } from "../protocols/jsonrpc/validate.js";
import {
  ChannelBusyError,
  ProtocolViolationError,
  RequestTimeoutError,
  TransportError,
} from "../shared/errors.js";
import { log } from "../shared/logging.js";
import type { LineReader } from "./line-reader.js";

export interface ChannelStreams {
  stdin: Writable;
  reader: LineReader;
}

export interface CallOptions {
  /** Fail the call, and retire the channel, if no response line arrives in time. */
  timeoutMs?: number;
}

/**
 * Correlated request/response over one child's stdin/stdout. Exactly one request
 * is outstanding at a time: each call writes one line and consumes one line.
 */
export class RpcChannel {
  private lastId = 0;
  private pendingMethod: string | null = null;
  private closedReason: string | null = null;

  constructor(
    private readonly streams: ChannelStreams,
    private readonly defaults: CallOptions = {}
  ) {}

  /** Id assigned to the most recent request (0 before the first call). */
  get lastRequestId(): number {
    return this.lastId;
  }

  get isOpen(): boolean {
    return this.closedReason === null;
  }

  get busy(): boolean {
    return this.pendingMethod !== null;
  }

  async call(
    method: string,
    params: JsonRpcParams = {},
    options: CallOptions = {}
  ): Promise<JsonRpcResponse> {
    if (this.closedReason !== null) {
      throw new TransportError(`Channel is closed (${this.closedReason}); cannot call ${method}`);
    }
    if (this.pendingMethod !== null) {
      throw new ChannelBusyError(method, this.pendingMethod);
    }
    this.pendingMethod = method;
    try {
      const id = ++this.lastId;
      const exchange = this.exchange(id, method, params);
      const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
      return timeoutMs === undefined
        ? await exchange
        : await this.withDeadline(exchange, method, timeoutMs);
    } finally {
      this.pendingMethod = null;
    }
  }

  close(reason: string): void {
    if (this.closedReason === null) this.closedReason = reason;
  }

  private async exchange(
    id: number,
    method: string,
    params: JsonRpcParams
  ): Promise<JsonRpcResponse> {
    log.debug({ id, method }, "rpc request");
    await this.write(serializeJsonRpc(buildRequest(id, method, params)));

    const line = await this.streams.reader.next();
    if (line === null) {
      this.close("server output ended");
      throw new TransportError(`Server closed its output before answering ${method} (id ${id})`);
    }

    const response = decodeResponseLine(line);
    const uncorrelatedError = response.id === null && response.error !== undefined;
    if (response.id !== id && !uncorrelatedError) {
      this.close("response id mismatch");
      throw new ProtocolViolationError(id, response.id);
    }
    log.debug({ id, method, errorCode: response.error?.code }, "rpc response");
    return response;
  }

  private write(payload: string): Promise<void> {
    const { stdin } = this.streams;
    if (stdin.destroyed || stdin.writableEnded) {
      this.close("server input closed");
      return Promise.reject(new TransportError("Server input stream is closed"));
    }
    return new Promise((resolve, reject) => {
      stdin.write(payload, (err) => {
        if (err) {
          this.close("write failed");
          reject(new TransportError(`Write to server failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  private async withDeadline(
    work: Promise<JsonRpcResponse>,
    method: string,
    timeoutMs: number
  ): Promise<JsonRpcResponse> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new RequestTimeoutError(method, timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([work, deadline]);
    } catch (err) {
      if (err instanceof RequestTimeoutError) {
        // A late line would be read as the answer to the next request.
        this.close("request timed out");
        void work.catch((late: unknown) => log.debug({ err: late, method }, "late rpc failure after timeout"));
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
