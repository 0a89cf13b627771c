import { describe, it, expect, vi } from "vitest";
import { RpcChannel, type CallOptions } from "../../src/client/channel.js";
import { LineReader } from "../../src/client/line-reader.js";
import {
  ChannelBusyError,
  ProtocolDecodeError,
  ProtocolViolationError,
  RequestTimeoutError,
  TransportError,
} from "../../src/shared/errors.js";
import { FakeServerProcess, fail, ok, type RequestHandler } from "../helpers/fake-server.js";

const echo: RequestHandler = (req) => ok(req, req.params);

function openChannel(handler: RequestHandler, defaults?: CallOptions) {
  const server = new FakeServerProcess(handler);
  const channel = new RpcChannel({ stdin: server.stdin, reader: new LineReader(server.stdout) }, defaults);
  return { server, channel };
}

describe("RpcChannel", () => {
  describe("request ids", () => {
    it("assigns strictly increasing ids starting at 1 and returns the matching response", async () => {
      const { server, channel } = openChannel(echo);

      const first = await channel.call("a");
      const second = await channel.call("b");
      const third = await channel.call("c");

      expect([first.id, second.id, third.id]).toEqual([1, 2, 3]);
      expect(server.received.map((req) => req.id)).toEqual([1, 2, 3]);
      expect(channel.lastRequestId).toBe(3);
    });

    it("does not consume an id for a call rejected as busy", async () => {
      const { server, channel } = openChannel((req) => (req.method === "slow" ? undefined : ok(req, {})));

      const slow = channel.call("slow");
      await expect(channel.call("other")).rejects.toBeInstanceOf(ChannelBusyError);
      await vi.waitFor(() => expect(server.received).toHaveLength(1));
      server.send(ok(server.received[0], {}));
      await slow;

      const next = await channel.call("other");
      expect(next.id).toBe(2);
    });
  });

  describe("framing", () => {
    it("writes a single JSON-RPC 2.0 request line", async () => {
      const { server, channel } = openChannel(echo);
      const params = { name: "analyzeCode", arguments: { sources: [{ code: "var a = 1;\nvar b = 2;" }] } };

      await channel.call("tools/call", params);

      expect(server.rawLines).toHaveLength(1);
      expect(JSON.parse(server.rawLines[0])).toEqual({
        jsonrpc: "2.0",
        id: 1,
        method: "tools/call",
        params,
      });
    });

    it("sends an empty object when no params are given", async () => {
      const { server, channel } = openChannel(echo);
      await channel.call("tools/list");
      expect(server.received[0].params).toEqual({});
    });

    it("round-trips params echoed back as the result", async () => {
      const { channel } = openChannel(echo);
      const params = { rootPath: "/srv/project", maxFiles: 500, nested: { list: [1, "two", null] } };

      const response = await channel.call("tools/call", params);

      expect(response.result).toEqual(params);
    });
  });

  describe("remote errors", () => {
    it("returns an error response as data", async () => {
      const { channel } = openChannel((req) => fail(req, -32601, "Unknown method nope"));

      const response = await channel.call("nope");

      expect(response).toEqual({
        jsonrpc: "2.0",
        id: 1,
        error: { code: -32601, message: "Unknown method nope" },
      });
    });

    it("accepts an error response whose id is null", async () => {
      const reply = { jsonrpc: "2.0", id: null, error: { code: -32000, message: "boom" } };
      const { channel } = openChannel(() => reply);

      await expect(channel.call("x")).resolves.toEqual(reply);
      expect(channel.isOpen).toBe(true);
    });
  });

  describe("decode failures", () => {
    it("rejects a non-JSON line and stays usable", async () => {
      const { channel } = openChannel((req) => (req.method === "bad" ? "this is not json" : ok(req, { fine: true })));

      const failure = channel.call("bad");
      await expect(failure).rejects.toBeInstanceOf(ProtocolDecodeError);
      await expect(failure).rejects.toMatchObject({ kind: "decode", line: "this is not json" });

      const next = await channel.call("good");
      expect(next).toEqual({ jsonrpc: "2.0", id: 2, result: { fine: true } });
      expect(channel.isOpen).toBe(true);
    });

    it("rejects a response carrying neither result nor error", async () => {
      const { channel } = openChannel((req) => ({ jsonrpc: "2.0", id: req.id }));
      await expect(channel.call("x")).rejects.toMatchObject({ kind: "decode" });
    });

    it("rejects a response from another protocol version", async () => {
      const { channel } = openChannel((req) => ({ jsonrpc: "1.0", id: req.id, result: {} }));
      await expect(channel.call("x")).rejects.toMatchObject({ kind: "decode" });
    });
  });

  describe("transport failures", () => {
    it("fails with a transport error when the server exits before answering", async () => {
      const { server, channel } = openChannel((req, srv) => {
        if (req.method === "crash") {
          srv.exit(1);
          return undefined;
        }
        return ok(req, {});
      });

      await expect(channel.call("crash")).rejects.toBeInstanceOf(TransportError);
      expect(channel.isOpen).toBe(false);

      await expect(channel.call("ping")).rejects.toMatchObject({ kind: "transport" });
      expect(server.methods).toEqual(["crash"]);
    });

    it("fails with a transport error when the input stream is closed", async () => {
      const { server, channel } = openChannel(echo);
      server.stdin.end();

      await expect(channel.call("ping")).rejects.toMatchObject({ kind: "transport" });
      expect(channel.isOpen).toBe(false);
    });

    it("refuses calls after close()", async () => {
      const { server, channel } = openChannel(echo);
      channel.close("stopped");

      await expect(channel.call("ping")).rejects.toThrow("Channel is closed (stopped); cannot call ping");
      expect(server.received).toHaveLength(0);
    });
  });

  describe("correlation", () => {
    it("retires the channel when the response id does not match", async () => {
      const { channel } = openChannel((req) => ({ jsonrpc: "2.0", id: req.id + 100, result: {} }));

      const failure = channel.call("x");
      await expect(failure).rejects.toBeInstanceOf(ProtocolViolationError);
      await expect(failure).rejects.toMatchObject({ kind: "protocol", expectedId: 1, receivedId: 101 });
      expect(channel.isOpen).toBe(false);
    });
  });

  describe("server notifications", () => {
    it("fails the pending call on a notification line and retires the channel on the next call", async () => {
      const { channel } = openChannel((req, srv) => {
        if (req.method === "tools/call") {
          srv.send({ jsonrpc: "2.0", method: "events/partialResult", params: { file: "A.cs" } });
          return ok(req, { done: true });
        }
        return ok(req, {});
      });

      await expect(channel.call("tools/call")).rejects.toMatchObject({ kind: "decode" });
      await expect(channel.call("tools/list")).rejects.toMatchObject({ kind: "protocol", expectedId: 2, receivedId: 1 });
      expect(channel.isOpen).toBe(false);
    });
  });

  describe("single request in flight", () => {
    it("rejects a second call without writing it", async () => {
      const { server, channel } = openChannel((req) => (req.method === "slow" ? undefined : ok(req, {})));

      const slow = channel.call("slow");
      expect(channel.busy).toBe(true);

      const busy = channel.call("analyze");
      await expect(busy).rejects.toBeInstanceOf(ChannelBusyError);
      await expect(busy).rejects.toThrow("Cannot call analyze: slow is still in flight");

      await vi.waitFor(() => expect(server.received).toHaveLength(1));
      server.send(ok(server.received[0], { done: true }));

      await expect(slow).resolves.toEqual({ jsonrpc: "2.0", id: 1, result: { done: true } });
      expect(channel.busy).toBe(false);
      expect(server.methods).toEqual(["slow"]);
    });
  });

  describe("timeouts", () => {
    it("fails a call after the default timeout and retires the channel", async () => {
      const { channel } = openChannel(() => undefined, { timeoutMs: 25 });

      const failure = channel.call("hang");
      await expect(failure).rejects.toBeInstanceOf(RequestTimeoutError);
      await expect(failure).rejects.toThrow("Request timeout after 25ms: hang");
      expect(channel.isOpen).toBe(false);
      expect(channel.busy).toBe(false);
    });

    it("honours a per-call timeout", async () => {
      const { channel } = openChannel(() => undefined);
      await expect(channel.call("hang", {}, { timeoutMs: 25 })).rejects.toMatchObject({ kind: "timeout" });
    });

    it("waits indefinitely when no timeout is configured", async () => {
      const { server, channel } = openChannel(() => undefined);

      const pending = channel.call("slow");
      await new Promise((r) => setTimeout(r, 50));
      expect(channel.busy).toBe(true);

      server.send(ok(server.received[0], "late"));
      await expect(pending).resolves.toMatchObject({ id: 1, result: "late" });
    });
  });
});
