import { StreamStateError, WebSocketProtocolError } from "./errors";
import { EMPTY_BODY, type FrameSink, type HandlerContext, type StreamHandler } from "./handler";
import { responseHeaders } from "./headers";
import { Mailbox } from "./mailbox";
import type {
  Application,
  DataReceivedEvent,
  Header,
  SendMessage,
  Transport,
  WebSocketReceiveEvent,
  WebSocketScope
} from "./types";
import { CloseCode, type WebSocketCodec, type WebSocketEvent } from "./ws-codec";

export type WebSocketState = "connecting" | "open" | "closing" | "closed";

export type WebSocketHandlerContext = HandlerContext<WebSocketScope> & {
  createCodec: () => WebSocketCodec;
};

/**
 * Bridges one extended-CONNECT stream to the application as a WebSocket
 * session. The application always sees `websocket.connect` first, and the
 * session is closed exactly once, by the application or on its behalf.
 */
export class WebSocketHandler implements StreamHandler {
  readonly streamId: number;
  readonly scope: WebSocketScope;
  private readonly sink: FrameSink;
  private readonly transport: Transport;
  private readonly serverName: string;
  private readonly createCodec: () => WebSocketCodec;
  private readonly mailbox = new Mailbox<WebSocketReceiveEvent>();
  private codec: WebSocketCodec | null = null;
  // Bytes that arrive before the application accepts, and whether the stream ended behind them.
  private early: Buffer[] = [];
  private earlyEnded = false;
  private currentState: WebSocketState = "connecting";
  private closed = false;
  private aborted = false;
  private failure: WebSocketProtocolError | null = null;

  constructor(context: WebSocketHandlerContext) {
    this.streamId = context.streamId;
    this.scope = context.scope;
    this.sink = context.sink;
    this.transport = context.transport;
    this.serverName = context.serverName;
    this.createCodec = context.createCodec;
    this.mailbox.put({ type: "websocket.connect" });
  }

  get state(): WebSocketState {
    return this.currentState;
  }

  onFramingEvent(event: DataReceivedEvent): void {
    if (this.failure || this.aborted) {
      return;
    }
    if (!this.codec) {
      this.early.push(event.data);
      this.earlyEnded = event.streamEnded;
      return;
    }
    this.feed(this.codec, event.data);
    if (event.streamEnded) {
      this.mailbox.close({ type: "websocket.disconnect", code: CloseCode.Abnormal });
    }
  }

  abort(): void {
    this.aborted = true;
    this.currentState = "closed";
    this.mailbox.close({ type: "websocket.disconnect", code: CloseCode.Abnormal });
  }

  readonly receive = (): Promise<WebSocketReceiveEvent> => this.mailbox.receive();

  readonly send = async (message: SendMessage): Promise<void> => {
    if (this.aborted) {
      return;
    }
    switch (message.type) {
      case "websocket.accept":
        this.accept(message.subprotocol, message.headers ?? []);
        break;
      case "websocket.send": {
        const codec = this.openCodec();
        let data: Buffer;
        if (message.text !== undefined) {
          data = codec.send({ type: "text", data: message.text });
        } else if (message.bytes !== undefined) {
          data = codec.send({ type: "binary", data: message.bytes });
        } else {
          throw new StreamStateError(this.streamId, "websocket.send needs text or bytes");
        }
        this.sink.sendData(this.streamId, data, false);
        break;
      }
      case "websocket.close":
        if (!this.closed) {
          this.close(message.code ?? CloseCode.Normal, message.reason ?? "");
        }
        break;
      case "http.response.start":
      case "http.response.body":
        throw new StreamStateError(this.streamId, `Unexpected message ${message.type} on a WebSocket stream`);
      default: {
        const unknown: never = message;
        throw new StreamStateError(this.streamId, `Unknown message ${JSON.stringify(unknown)}`);
      }
    }
    this.transport.transmit();
  };

  async run(application: Application): Promise<void> {
    try {
      await application(this.scope, this.receive, this.send);
    } finally {
      if (!this.closed) {
        await this.send({ type: "websocket.close", code: this.failure?.closeCode ?? CloseCode.Normal });
      }
      this.currentState = "closed";
      this.mailbox.close({ type: "websocket.disconnect", code: CloseCode.Normal });
    }
  }

  private accept(subprotocol: string | undefined, extra: Header[]): void {
    if (this.codec || this.closed) {
      throw new StreamStateError(this.streamId, "WebSocket already accepted or closed");
    }
    const codec = this.createCodec();
    this.codec = codec;
    this.currentState = "open";
    const headers: Header[] = subprotocol !== undefined ? [["sec-websocket-protocol", subprotocol], ...extra] : extra;
    this.sink.sendHeaders(this.streamId, responseHeaders(200, this.serverName, headers));
    for (const chunk of this.early.splice(0)) {
      this.feed(codec, chunk);
    }
    if (this.earlyEnded) {
      this.mailbox.close({ type: "websocket.disconnect", code: CloseCode.Abnormal });
    }
  }

  private close(code: number, reason: string): void {
    this.closed = true;
    if (!this.codec) {
      // Closing before accept rejects the upgrade.
      this.sink.sendHeaders(this.streamId, [[":status", "403"]]);
      this.sink.sendData(this.streamId, EMPTY_BODY, true);
    } else {
      this.sink.sendData(this.streamId, this.codec.send({ type: "close", code, reason }), true);
    }
    this.currentState = "closed";
  }

  private openCodec(): WebSocketCodec {
    if (!this.codec || this.closed) {
      throw new StreamStateError(this.streamId, "WebSocket is not open");
    }
    return this.codec;
  }

  private feed(codec: WebSocketCodec, data: Buffer): void {
    try {
      codec.receiveData(data);
    } catch (err) {
      if (!(err instanceof WebSocketProtocolError)) {
        throw err;
      }
      this.failure = err;
    }
    // Events decoded before a violation are still delivered ahead of it.
    for (const event of codec.nextEvents()) {
      this.websocketEventReceived(codec, event);
    }
    if (this.failure) {
      this.mailbox.fail(this.failure);
    }
  }

  private websocketEventReceived(codec: WebSocketCodec, event: WebSocketEvent): void {
    switch (event.type) {
      case "text":
        this.mailbox.put({ type: "websocket.receive", text: event.data });
        return;
      case "binary":
        this.mailbox.put({ type: "websocket.receive", bytes: event.data });
        return;
      case "close":
        if (!this.closed) {
          this.currentState = "closing";
        }
        this.mailbox.close({ type: "websocket.disconnect", code: event.code });
        return;
      case "ping":
        if (!this.closed) {
          this.sink.sendData(this.streamId, codec.send({ type: "pong", payload: event.payload }), false);
          this.transport.transmit();
        }
        return;
      case "pong":
        return;
      default: {
        const unknown: never = event;
        throw new Error(`Unhandled WebSocket event: ${JSON.stringify(unknown)}`);
      }
    }
  }
}
