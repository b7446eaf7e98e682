import http2, {
  type IncomingHttpHeaders,
  type OutgoingHttpHeaders,
  type ServerHttp2Stream
} from "node:http2";

import { StreamStateError } from "./errors";
import { EMPTY_BODY } from "./handler";
import type { FramingEvent, HeaderList, HttpFraming } from "./types";

export type Http2TransportEvent =
  | { type: "stream"; stream: ServerHttp2Stream; headers: IncomingHttpHeaders; endStream: boolean }
  | { type: "data"; stream: ServerHttp2Stream; chunk: Buffer }
  | { type: "end"; stream: ServerHttp2Stream }
  | { type: "reset"; stream: ServerHttp2Stream; errorCode: number };

const { HTTP2_HEADER_STATUS, NGHTTP2_INTERNAL_ERROR } = http2.constants;

/**
 * Framing over a Node HTTP/2 session. nghttp2 has already decoded the wire
 * format, so each transport event maps onto exactly one framing event and
 * outbound frames are handed straight to the stream.
 */
export class Http2Framing implements HttpFraming<Http2TransportEvent> {
  readonly variant = "full";
  readonly httpVersion = "2";
  private readonly streams = new Map<number, ServerHttp2Stream>();
  // Streams whose request carried END_STREAM on its headers; their later
  // "end" is already reported by request-received.
  private readonly endedWithHeaders = new Set<number>();

  handleEvent(event: Http2TransportEvent): FramingEvent[] {
    const streamId = event.stream.id;
    if (streamId === undefined) {
      return [];
    }
    switch (event.type) {
      case "stream":
        this.streams.set(streamId, event.stream);
        if (event.endStream) {
          this.endedWithHeaders.add(streamId);
        }
        return [
          { type: "request-received", streamId, headers: toHeaderList(event.headers), streamEnded: event.endStream }
        ];
      case "data":
        return [{ type: "data-received", streamId, data: event.chunk, streamEnded: false }];
      case "end":
        if (this.endedWithHeaders.delete(streamId)) {
          return [];
        }
        return [{ type: "data-received", streamId, data: EMPTY_BODY, streamEnded: true }];
      case "reset":
        this.streams.delete(streamId);
        this.endedWithHeaders.delete(streamId);
        return [{ type: "stream-reset", streamId, errorCode: event.errorCode }];
      default: {
        const unknown: never = event;
        throw new Error(`Unhandled HTTP/2 event: ${JSON.stringify(unknown)}`);
      }
    }
  }

  sendHeaders(streamId: number, headers: HeaderList): void {
    this.writable(streamId).respond(toOutgoingHeaders(headers));
  }

  sendData(streamId: number, data: Buffer, endStream: boolean): void {
    const stream = this.writable(streamId);
    if (!endStream) {
      stream.write(data);
      return;
    }
    if (!stream.headersSent) {
      // The application finished without starting a response.
      stream.respond({ [HTTP2_HEADER_STATUS]: 500 });
    }
    stream.end(data);
    this.streams.delete(streamId);
  }

  /** Resets a stream whose application task failed. */
  reset(streamId: number): void {
    const stream = this.streams.get(streamId);
    this.streams.delete(streamId);
    if (stream && !stream.closed && !stream.destroyed) {
      stream.close(NGHTTP2_INTERNAL_ERROR);
    }
  }

  private writable(streamId: number): ServerHttp2Stream {
    const stream = this.streams.get(streamId);
    if (!stream || stream.destroyed || stream.closed) {
      throw new StreamStateError(streamId, "Stream is no longer writable");
    }
    return stream;
  }
}

export function toHeaderList(headers: IncomingHttpHeaders): HeaderList {
  const list: HeaderList = [];
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const entry of value) {
        list.push([name, entry]);
      }
    } else {
      list.push([name, value]);
    }
  }
  return list;
}

export function toOutgoingHeaders(headers: HeaderList): OutgoingHttpHeaders {
  const outgoing: OutgoingHttpHeaders = {};
  for (const [name, value] of headers) {
    const key = name.toLowerCase();
    if (key === HTTP2_HEADER_STATUS) {
      outgoing[key] = Number(value);
      continue;
    }
    const existing = outgoing[key];
    if (existing === undefined) {
      outgoing[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      outgoing[key] = [String(existing), value];
    }
  }
  return outgoing;
}

export function createHttp2Framing(): Http2Framing {
  return new Http2Framing();
}
