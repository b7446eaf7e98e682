import { describe, it, expect } from "vitest";

import { CloseCode, ServerWebSocketCodec, WebSocketProtocolError, createServerCodec } from "../src/index";
import { clientFrame, closePayload } from "./helpers";

const TEXT = 0x1;
const BINARY = 0x2;
const CONTINUATION = 0x0;
const CLOSE = 0x8;
const PING = 0x9;
const PONG = 0xa;

function protocolErrorFrom(action: () => void): WebSocketProtocolError {
  try {
    action();
  } catch (err) {
    if (err instanceof WebSocketProtocolError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a WebSocketProtocolError");
}

describe("ServerWebSocketCodec decoding", () => {
  it("queues text and binary messages as soon as they are written", () => {
    const codec = createServerCodec();
    codec.receiveData(Buffer.concat([clientFrame(TEXT, "hello"), clientFrame(BINARY, Buffer.from([0, 1, 2, 255]))]));
    expect(codec.nextEvents()).toEqual([
      { type: "text", data: "hello" },
      { type: "binary", data: Buffer.from([0, 1, 2, 255]) }
    ]);
    expect(codec.nextEvents()).toEqual([]);
  });

  it("waits for a frame split across reads", () => {
    const codec = createServerCodec();
    const frame = clientFrame(TEXT, "split me");
    for (const byte of frame) {
      codec.receiveData(Buffer.from([byte]));
    }
    expect(codec.nextEvents()).toEqual([{ type: "text", data: "split me" }]);
  });

  it("keeps control frames in order around a fragmented message", () => {
    const codec = createServerCodec();
    codec.receiveData(
      Buffer.concat([
        clientFrame(TEXT, "frag", { fin: false }),
        clientFrame(PING, "p"),
        clientFrame(CONTINUATION, "men", { fin: false }),
        clientFrame(CONTINUATION, "ted"),
        clientFrame(PONG, "q")
      ])
    );
    expect(codec.nextEvents()).toEqual([
      { type: "ping", payload: Buffer.from("p") },
      { type: "text", data: "fragmented" },
      { type: "pong", payload: Buffer.from("q") }
    ]);
  });

  it("decodes close codes and reasons", () => {
    const codec = createServerCodec();
    codec.receiveData(clientFrame(CLOSE, closePayload(1001, "going away")));
    expect(codec.nextEvents()).toEqual([{ type: "close", code: 1001, reason: "going away" }]);
  });

  it("reports 1005 for a close frame without a payload", () => {
    const codec = createServerCodec();
    codec.receiveData(clientFrame(CLOSE));
    expect(codec.nextEvents()).toEqual([{ type: "close", code: CloseCode.NoStatus, reason: "" }]);
  });

  it("ignores everything after a close frame", () => {
    const codec = createServerCodec();
    codec.receiveData(Buffer.concat([clientFrame(CLOSE, closePayload(1000)), clientFrame(TEXT, "late")]));
    codec.receiveData(clientFrame(TEXT, "later", { masked: false }));
    expect(codec.nextEvents()).toEqual([{ type: "close", code: 1000, reason: "" }]);
  });
});

describe("ServerWebSocketCodec validation", () => {
  it("closes with 1002 on framing violations", () => {
    expect(protocolErrorFrom(() => createServerCodec().receiveData(clientFrame(TEXT, "hi", { masked: false }))).closeCode).toBe(
      CloseCode.ProtocolError
    );
    expect(protocolErrorFrom(() => createServerCodec().receiveData(clientFrame(TEXT, "hi", { rsv: 0b100 }))).closeCode).toBe(
      CloseCode.ProtocolError
    );
    expect(protocolErrorFrom(() => createServerCodec().receiveData(clientFrame(PING, "x", { fin: false }))).closeCode).toBe(
      CloseCode.ProtocolError
    );
    expect(protocolErrorFrom(() => createServerCodec().receiveData(clientFrame(CONTINUATION, "x"))).closeCode).toBe(
      CloseCode.ProtocolError
    );
  });

  it("refuses close codes that may not appear on the wire", () => {
    for (const code of [999, CloseCode.NoStatus, CloseCode.Abnormal, 1015]) {
      const err = protocolErrorFrom(() => createServerCodec().receiveData(clientFrame(CLOSE, closePayload(code))));
      expect(err.closeCode).toBe(CloseCode.ProtocolError);
    }
  });

  it("closes with 1007 on invalid UTF-8", () => {
    const err = protocolErrorFrom(() => createServerCodec().receiveData(clientFrame(TEXT, Buffer.from([0xc3, 0x28]))));
    expect(err.closeCode).toBe(CloseCode.InvalidPayload);
  });

  it("closes with 1009 past the payload limit, across fragments too", () => {
    const single = protocolErrorFrom(() =>
      new ServerWebSocketCodec({ maxPayloadBytes: 4 }).receiveData(clientFrame(BINARY, Buffer.alloc(5)))
    );
    expect(single.closeCode).toBe(CloseCode.MessageTooBig);

    const codec = new ServerWebSocketCodec({ maxPayloadBytes: 4 });
    codec.receiveData(clientFrame(BINARY, Buffer.alloc(3), { fin: false }));
    const fragmented = protocolErrorFrom(() => codec.receiveData(clientFrame(CONTINUATION, Buffer.alloc(3))));
    expect(fragmented.closeCode).toBe(CloseCode.MessageTooBig);
  });

  it("keeps events decoded ahead of a violation", () => {
    const codec = createServerCodec();
    protocolErrorFrom(() =>
      codec.receiveData(Buffer.concat([clientFrame(TEXT, "ok"), clientFrame(TEXT, "bad", { masked: false })]))
    );
    expect(codec.nextEvents()).toEqual([{ type: "text", data: "ok" }]);
  });

  it("keeps failing once a violation has been seen", () => {
    const codec = createServerCodec();
    const first = protocolErrorFrom(() => codec.receiveData(clientFrame(TEXT, "hi", { masked: false })));
    expect(protocolErrorFrom(() => codec.receiveData(clientFrame(TEXT, "fine")))).toBe(first);
    expect(codec.nextEvents()).toEqual([]);
  });
});

describe("ServerWebSocketCodec encoding", () => {
  const codec = createServerCodec();

  it("writes unmasked final frames", () => {
    expect(codec.send({ type: "text", data: "hi" })).toEqual(Buffer.from([0x81, 0x02, 0x68, 0x69]));
    expect(codec.send({ type: "pong", payload: Buffer.from("p") })).toEqual(Buffer.from([0x8a, 0x01, 0x70]));

    const medium = codec.send({ type: "binary", data: Buffer.alloc(300) });
    expect(medium.subarray(0, 4)).toEqual(Buffer.from([0x82, 126, 0x01, 0x2c]));
    expect(medium.length).toBe(304);
  });

  it("writes the close code and reason", () => {
    expect(codec.send({ type: "close", code: 4000, reason: "bye" })).toEqual(
      Buffer.from([0x88, 0x05, 0x0f, 0xa0, 0x62, 0x79, 0x65])
    );
  });

  it("never puts reserved close codes on the wire", () => {
    expect(codec.send({ type: "close", code: CloseCode.NoStatus, reason: "" })).toEqual(Buffer.from([0x88, 0x00]));
    expect(codec.send({ type: "close", code: CloseCode.Abnormal, reason: "lost" })).toEqual(Buffer.from([0x88, 0x00]));
  });

  it("cuts long close reasons to fit a control frame without splitting a character", () => {
    const ascii = codec.send({ type: "close", code: 1000, reason: "x".repeat(200) });
    expect(ascii.subarray(0, 2)).toEqual(Buffer.from([0x88, 125]));
    expect(ascii.subarray(4).toString("utf8")).toBe("x".repeat(123));

    // 122 ASCII bytes then a two-byte character straddling the limit.
    const split = codec.send({ type: "close", code: 1000, reason: "x".repeat(122) + "é" });
    expect(split[1]).toBe(124);
    expect(split.subarray(4).toString("utf8")).toBe("x".repeat(122));
  });
});
