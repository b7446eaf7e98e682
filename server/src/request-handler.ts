import { StreamStateError } from "./errors";
import { EMPTY_BODY, type FrameSink, type HandlerContext, type StreamHandler } from "./handler";
import { responseHeaders } from "./headers";
import { Mailbox } from "./mailbox";
import type {
  Application,
  DataReceivedEvent,
  HttpReceiveMessage,
  HttpScope,
  SendMessage,
  Transport
} from "./types";

export type RequestState = "awaiting-body" | "streaming-body" | "half-closed" | "closed";

/**
 * Bridges one HTTP request/response exchange to the application. The
 * response stream is ended only once the application returns.
 */
export class RequestHandler implements StreamHandler {
  readonly streamId: number;
  readonly scope: HttpScope;
  private readonly sink: FrameSink;
  private readonly transport: Transport;
  private readonly serverName: string;
  private readonly mailbox = new Mailbox<HttpReceiveMessage>();
  private currentState: RequestState = "awaiting-body";
  private responseStarted = false;
  private aborted = false;

  constructor(context: HandlerContext<HttpScope>) {
    this.streamId = context.streamId;
    this.scope = context.scope;
    this.sink = context.sink;
    this.transport = context.transport;
    this.serverName = context.serverName;
  }

  get state(): RequestState {
    return this.currentState;
  }

  onFramingEvent(event: DataReceivedEvent): void {
    if (this.currentState === "awaiting-body") {
      this.currentState = "streaming-body";
    }
    this.mailbox.put({ type: "http.request", body: event.data, moreBody: !event.streamEnded });
  }

  abort(): void {
    this.aborted = true;
    this.mailbox.close({ type: "http.disconnect" });
  }

  readonly receive = (): Promise<HttpReceiveMessage> => this.mailbox.receive();

  readonly send = async (message: SendMessage): Promise<void> => {
    if (this.aborted) {
      return;
    }
    switch (message.type) {
      case "http.response.start":
        if (this.responseStarted) {
          throw new StreamStateError(this.streamId, "Response already started");
        }
        this.responseStarted = true;
        this.sink.sendHeaders(this.streamId, responseHeaders(message.status, this.serverName, message.headers));
        break;
      case "http.response.body":
        if (!this.responseStarted) {
          throw new StreamStateError(this.streamId, "Response body sent before response start");
        }
        this.sink.sendData(this.streamId, message.body ?? EMPTY_BODY, false);
        break;
      case "websocket.accept":
      case "websocket.send":
      case "websocket.close":
        throw new StreamStateError(this.streamId, `Unexpected message ${message.type} on an HTTP stream`);
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
    } catch (err) {
      this.finish();
      throw err;
    }
    this.currentState = "half-closed";
    if (!this.aborted) {
      this.sink.sendData(this.streamId, EMPTY_BODY, true);
      this.transport.transmit();
    }
    this.finish();
  }

  private finish(): void {
    this.currentState = "closed";
    this.mailbox.close({ type: "http.disconnect" });
  }
}
