import { describe, it, expect } from "vitest";
import { buildRequest, parseJsonRpcLine, serializeJsonRpc } from "../../src/protocols/jsonrpc/codec.js";
import { decodeResponseLine, isErrorResponse, parseResponse } from "../../src/protocols/jsonrpc/validate.js";
import { ProtocolDecodeError } from "../../src/shared/errors.js";

describe("codec", () => {
  it("builds a 2.0 request", () => {
    expect(buildRequest(4, "tools/list", {})).toEqual({ jsonrpc: "2.0", id: 4, method: "tools/list", params: {} });
  });

  it("serializes to exactly one line even when values contain newlines", () => {
    const line = serializeJsonRpc(buildRequest(1, "tools/call", { code: "a();\nb();" }));
    expect(line.endsWith("\n")).toBe(true);
    expect(line.split("\n")).toHaveLength(2);
    expect(JSON.parse(line)).toMatchObject({ params: { code: "a();\nb();" } });
  });

  it("returns null for a blank line", () => {
    expect(parseJsonRpcLine("   ")).toBeNull();
    expect(parseJsonRpcLine(' {"a":1} ')).toEqual({ a: 1 });
  });
});

describe("parseResponse", () => {
  it("accepts a result or an error", () => {
    expect(parseResponse({ jsonrpc: "2.0", id: 1, result: { ok: true } })).toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: { ok: true },
    });
    const error = parseResponse({ jsonrpc: "2.0", id: 2, error: { code: -32601, message: "nope" } });
    expect(isErrorResponse(error)).toBe(true);
  });

  it("accepts a null result", () => {
    expect(parseResponse({ jsonrpc: "2.0", id: 1, result: null }).result).toBeNull();
  });

  it("rejects both or neither of result and error", () => {
    expect(() => parseResponse({ jsonrpc: "2.0", id: 1 })).toThrow(
      "Invalid JSON-RPC response: exactly one of result or error must be present"
    );
    expect(() =>
      parseResponse({ jsonrpc: "2.0", id: 1, result: {}, error: { code: 1, message: "x" } })
    ).toThrow("exactly one of result or error must be present");
  });

  it("rejects a malformed error member", () => {
    expect(() => parseResponse({ jsonrpc: "2.0", id: 1, error: { message: "no code" } })).toThrow(
      /^Invalid JSON-RPC response: /
    );
  });
});

describe("decodeResponseLine", () => {
  it("decodes a response line", () => {
    const response = decodeResponseLine('{"jsonrpc":"2.0","id":3,"result":[]}');
    expect(response).toEqual({ jsonrpc: "2.0", id: 3, result: [] });
    expect(isErrorResponse(response)).toBe(false);
  });

  it("reports an empty line", () => {
    expect(() => decodeResponseLine("")).toThrow("Response line is empty");
  });

  it("reports JSON null as an invalid response, not an empty line", () => {
    expect(() => decodeResponseLine("null")).toThrow(/^Invalid JSON-RPC response: /);
  });

  it("keeps the offending line and a short preview", () => {
    const line = "x".repeat(100);
    try {
      decodeResponseLine(line);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ProtocolDecodeError);
      if (!(err instanceof ProtocolDecodeError)) return;
      expect(err.line).toBe(line);
      expect(err.message).toBe(`Response is not valid JSON: ${"x".repeat(80)}…`);
    }
  });
});
