import type { FramingEvent, FramingVariant, HeaderList, HttpFraming, Transport } from "../src/index";

export class CountingTransport implements Transport {
  transmits = 0;

  transmit(): void {
    this.transmits += 1;
  }
}

export type SentFrame =
  | { kind: "headers"; streamId: number; headers: HeaderList }
  | { kind: "data"; streamId: number; data: Buffer; endStream: boolean };

/**
 * Framing stand-in whose transport events are already framing events, so a
 * test can hand the dispatcher several at once. Everything sent is recorded.
 */
export class RecordingFraming implements HttpFraming<FramingEvent[]> {
  readonly frames: SentFrame[] = [];

  constructor(
    readonly variant: FramingVariant = "full",
    readonly httpVersion = "3"
  ) {}

  handleEvent(events: FramingEvent[]): FramingEvent[] {
    return events;
  }

  sendHeaders(streamId: number, headers: HeaderList): void {
    this.frames.push({ kind: "headers", streamId, headers });
  }

  sendData(streamId: number, data: Buffer, endStream: boolean): void {
    this.frames.push({ kind: "data", streamId, data, endStream });
  }

  headersFor(streamId: number): HeaderList[] {
    const result: HeaderList[] = [];
    for (const frame of this.frames) {
      if (frame.kind === "headers" && frame.streamId === streamId) {
        result.push(frame.headers);
      }
    }
    return result;
  }

  dataFor(streamId: number): Array<{ data: Buffer; endStream: boolean }> {
    const result: Array<{ data: Buffer; endStream: boolean }> = [];
    for (const frame of this.frames) {
      if (frame.kind === "data" && frame.streamId === streamId) {
        result.push({ data: frame.data, endStream: frame.endStream });
      }
    }
    return result;
  }
}

export function requestHeaders(method: string, path: string, extra: HeaderList = []): HeaderList {
  return [[":method", method], [":scheme", "https"], [":authority", "localhost"], [":path", path], ...extra];
}

export function websocketHeaders(path: string, extra: HeaderList = []): HeaderList {
  return requestHeaders("CONNECT", path, [[":protocol", "websocket"], ...extra]);
}

/** Drops the `date` value, which changes from run to run. */
export function withoutDate(headers: HeaderList): HeaderList {
  return headers.filter(([name]) => name !== "date");
}

const TEST_MASK = Buffer.from([0x37, 0xfa, 0x21, 0x3d]);

/** Builds a client-to-server frame; masked unless told otherwise. */
export function clientFrame(
  opcode: number,
  payload: Buffer | string = Buffer.alloc(0),
  options: { fin?: boolean; masked?: boolean; rsv?: number } = {}
): Buffer {
  const data = typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
  const fin = options.fin ?? true;
  const masked = options.masked ?? true;
  let lengthBytes: Buffer;
  if (data.length < 126) {
    lengthBytes = Buffer.from([data.length]);
  } else if (data.length < 65536) {
    lengthBytes = Buffer.alloc(3);
    lengthBytes[0] = 126;
    lengthBytes.writeUInt16BE(data.length, 1);
  } else {
    lengthBytes = Buffer.alloc(9);
    lengthBytes[0] = 127;
    lengthBytes.writeUInt32BE(0, 1);
    lengthBytes.writeUInt32BE(data.length, 5);
  }
  if (masked) {
    lengthBytes[0] |= 0x80;
  }
  const first = Buffer.from([(fin ? 0x80 : 0) | ((options.rsv ?? 0) << 4) | opcode]);
  if (!masked) {
    return Buffer.concat([first, lengthBytes, data]);
  }
  const body = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    body[i] = data[i] ^ TEST_MASK[i % 4];
  }
  return Buffer.concat([first, lengthBytes, TEST_MASK, body]);
}

export function closePayload(code: number, reason = ""): Buffer {
  const payload = Buffer.alloc(2 + Buffer.byteLength(reason));
  payload.writeUInt16BE(code, 0);
  payload.write(reason, 2, "utf8");
  return payload;
}

/** Lets every queued microtask and the current I/O turn run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
