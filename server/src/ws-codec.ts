import { Receiver, Sender } from "ws";

import { WebSocketProtocolError } from "./errors";

export type WebSocketEvent =
  | { type: "text"; data: string }
  | { type: "binary"; data: Buffer }
  | { type: "close"; code: number; reason: string }
  | { type: "ping"; payload: Buffer }
  | { type: "pong"; payload: Buffer };

/**
 * Server side of the WebSocket message layer. Raw stream bytes go in
 * through `receiveData`, decoded events come out of `nextEvents`, and
 * `send` turns an outbound event into the bytes to put on the stream.
 */
export interface WebSocketCodec {
  receiveData(data: Buffer): void;
  nextEvents(): WebSocketEvent[];
  send(event: WebSocketEvent): Buffer;
}

export type WebSocketCodecOptions = {
  maxPayloadBytes?: number;
};

export const DEFAULT_MAX_PAYLOAD_BYTES = 16 * 1024 * 1024;

export const CloseCode = {
  Normal: 1000,
  GoingAway: 1001,
  ProtocolError: 1002,
  NoStatus: 1005,
  Abnormal: 1006,
  InvalidPayload: 1007,
  MessageTooBig: 1009
} as const;

enum Opcode {
  Text = 0x1,
  Binary = 0x2,
  Close = 0x8,
  Ping = 0x9,
  Pong = 0xa
}

const MAX_CLOSE_REASON_BYTES = 123;
const EMPTY = Buffer.alloc(0);

/** Close codes for the error codes `ws` attaches to frame violations. */
const CLOSE_CODE_BY_WS_ERROR: Record<string, number> = {
  WS_ERR_INVALID_UTF8: CloseCode.InvalidPayload,
  WS_ERR_UNSUPPORTED_MESSAGE_LENGTH: CloseCode.MessageTooBig,
  WS_ERR_UNSUPPORTED_DATA_PAYLOAD_LENGTH: CloseCode.MessageTooBig
};

function toProtocolError(err: Error): WebSocketProtocolError {
  const wsCode = "code" in err && typeof err.code === "string" ? err.code : "";
  return new WebSocketProtocolError(CLOSE_CODE_BY_WS_ERROR[wsCode] ?? CloseCode.ProtocolError, err.message);
}

/**
 * Decodes with the `ws` frame receiver in server mode, which requires masked
 * client frames, reassembles fragments and validates UTF-8 and close codes.
 * Events are emitted synchronously, so every event a chunk carries is queued
 * by the time `receiveData` returns.
 */
export class ServerWebSocketCodec implements WebSocketCodec {
  private readonly receiver: Receiver;
  private readonly events: WebSocketEvent[] = [];
  private peerClosed = false;
  private failure: WebSocketProtocolError | null = null;

  constructor(options: WebSocketCodecOptions = {}) {
    this.receiver = new Receiver({
      isServer: true,
      maxPayload: options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES,
      allowSynchronousEvents: true
    });
    this.receiver.on("message", (data, isBinary) => {
      this.events.push(isBinary ? { type: "binary", data } : { type: "text", data: data.toString("utf8") });
    });
    this.receiver.on("ping", (payload) => this.events.push({ type: "ping", payload }));
    this.receiver.on("pong", (payload) => this.events.push({ type: "pong", payload }));
    this.receiver.on("conclude", (code, reason) => {
      this.peerClosed = true;
      this.events.push({ type: "close", code, reason: reason.toString("utf8") });
    });
    // The stream re-emits a failed write on a later tick; receiveData has thrown it by then.
    this.receiver.on("error", (err) => {
      this.failure ??= toProtocolError(err);
    });
  }

  receiveData(data: Buffer): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.peerClosed || data.length === 0) {
      return;
    }
    this.receiver.write(data);
    const err = this.receiver.errored;
    if (err) {
      this.failure = toProtocolError(err);
      throw this.failure;
    }
  }

  nextEvents(): WebSocketEvent[] {
    return this.events.splice(0);
  }

  send(event: WebSocketEvent): Buffer {
    switch (event.type) {
      case "text":
        return encodeFrame(Opcode.Text, Buffer.from(event.data, "utf8"));
      case "binary":
        return encodeFrame(Opcode.Binary, event.data);
      case "close":
        return encodeFrame(Opcode.Close, encodeClosePayload(event.code, event.reason));
      case "ping":
        return encodeFrame(Opcode.Ping, event.payload);
      case "pong":
        return encodeFrame(Opcode.Pong, event.payload);
      default: {
        const unknown: never = event;
        throw new Error(`Unhandled WebSocket event: ${JSON.stringify(unknown)}`);
      }
    }
  }
}

function encodeClosePayload(code: number, reason: string): Buffer {
  // 1005 and 1006 are reserved for local reporting and never sent.
  if (code === CloseCode.NoStatus || code === CloseCode.Abnormal) {
    return EMPTY;
  }
  let reasonBytes = Buffer.from(reason, "utf8");
  if (reasonBytes.length > MAX_CLOSE_REASON_BYTES) {
    let end = MAX_CLOSE_REASON_BYTES;
    // Back up to the start of a split UTF-8 sequence.
    while (end > 0 && (reasonBytes[end] & 0xc0) === 0x80) {
      end--;
    }
    reasonBytes = reasonBytes.subarray(0, end);
  }
  const payload = Buffer.alloc(2 + reasonBytes.length);
  payload.writeUInt16BE(code, 0);
  reasonBytes.copy(payload, 2);
  return payload;
}

/** Server-to-client frames are final and unmasked. */
function encodeFrame(opcode: Opcode, payload: Buffer): Buffer {
  return Buffer.concat(Sender.frame(payload, { fin: true, opcode, mask: false, readOnly: false, rsv1: false }));
}

export function createServerCodec(options?: WebSocketCodecOptions): WebSocketCodec {
  return new ServerWebSocketCodec(options);
}
