import { EMPTY_BODY, type StreamHandler } from "./handler";
import { parseRequestHeaders } from "./headers";
import { silentLogger } from "./logger";
import { RequestHandler } from "./request-handler";
import type {
  Application,
  FramingEvent,
  FramingFactory,
  FramingVariant,
  HttpFraming,
  Logger,
  RequestReceivedEvent,
  StreamResetEvent,
  Transport
} from "./types";
import { WebSocketHandler } from "./websocket-handler";
import { createServerCodec, type WebSocketCodec } from "./ws-codec";

/** ALPN identifiers and the framing variant each one selects. */
export const ALPN_VARIANTS: Readonly<Record<string, FramingVariant>> = {
  h3: "full",
  "h3-29": "full",
  h2: "full",
  h2c: "full",
  "hq-interop": "minimal",
  "hq-29": "minimal"
};

export const DEFAULT_SERVER_NAME = "streamgate";

export type ConnectionOptions<TEvent> = {
  application: Application;
  transport: Transport;
  framings: Partial<Record<FramingVariant, FramingFactory<TEvent>>>;
  alpnVariants?: Readonly<Record<string, FramingVariant>>;
  serverName?: string;
  createCodec?: () => WebSocketCodec;
  logger?: Logger;
  label?: string;
  /**
   * Called with the error of any stream whose application task failed. The
   * handler has already been removed when this runs.
   */
  onStreamError?: (streamId: number, error: unknown) => void;
};

/**
 * Stream ids that have finished, kept as one floor per id class (the low two
 * bits) plus the finished ids above it. Ids of a class open in increasing
 * order, so the floor climbs as streams complete and only ids that finished
 * ahead of a lower, still-open one are held individually.
 */
export class RetiredStreamIds {
  private readonly floors = new Map<number, number>();
  private readonly pending = new Set<number>();

  /** Ids held above their class floor. */
  get size(): number {
    return this.pending.size;
  }

  add(streamId: number): void {
    const idClass = streamId % 4;
    let floor = this.floors.get(idClass) ?? idClass;
    if (streamId < floor) {
      return;
    }
    this.pending.add(streamId);
    while (this.pending.delete(floor)) {
      floor += 4;
    }
    this.floors.set(idClass, floor);
  }

  has(streamId: number): boolean {
    return streamId < (this.floors.get(streamId % 4) ?? streamId % 4) || this.pending.has(streamId);
  }
}

/**
 * Dispatcher for one physical connection. Owns the negotiated framing layer
 * and the table of live stream handlers, and routes every event to the
 * handler of its stream.
 */
export class HttpServerConnection<TEvent> {
  private readonly application: Application;
  private readonly transport: Transport;
  private readonly framings: Partial<Record<FramingVariant, FramingFactory<TEvent>>>;
  private readonly alpnVariants: Readonly<Record<string, FramingVariant>>;
  private readonly serverName: string;
  private readonly createCodec: () => WebSocketCodec;
  private readonly logger: Logger;
  private readonly label: string;
  private readonly onStreamError?: (streamId: number, error: unknown) => void;
  private readonly handlers = new Map<number, StreamHandler>();
  private readonly retired = new RetiredStreamIds();
  private readonly tasks = new Set<Promise<void>>();
  private framing: HttpFraming<TEvent> | null = null;
  private alpn: string | null = null;

  constructor(options: ConnectionOptions<TEvent>) {
    this.application = options.application;
    this.transport = options.transport;
    this.framings = options.framings;
    this.alpnVariants = options.alpnVariants ?? ALPN_VARIANTS;
    this.serverName = options.serverName ?? DEFAULT_SERVER_NAME;
    this.createCodec = options.createCodec ?? (() => createServerCodec());
    this.logger = options.logger ?? silentLogger;
    this.label = options.label ?? "connection";
    this.onStreamError = options.onStreamError;
  }

  get negotiatedProtocol(): string | null {
    return this.alpn;
  }

  get variant(): FramingVariant | null {
    return this.framing?.variant ?? null;
  }

  get activeStreamCount(): number {
    return this.handlers.size;
  }

  hasStream(streamId: number): boolean {
    return this.handlers.has(streamId);
  }

  onTransportNegotiated(alpn: string): void {
    if (this.framing) {
      this.logger.debug("negotiation_ignored", { connection: this.label, alpn, current: this.alpn });
      return;
    }
    const variant = this.alpnVariants[alpn];
    const factory = variant ? this.framings[variant] : undefined;
    if (!factory) {
      this.logger.warn("unsupported_alpn", { connection: this.label, alpn });
      return;
    }
    this.framing = factory();
    this.alpn = alpn;
    this.logger.debug("protocol_negotiated", { connection: this.label, alpn, variant });
  }

  onTransportEvent(event: TEvent): void {
    const framing = this.framing;
    if (!framing) {
      this.logger.debug("event_before_negotiation", { connection: this.label });
      return;
    }
    for (const framingEvent of framing.handleEvent(event)) {
      this.dispatch(framing, framingEvent);
    }
    this.transport.transmit();
  }

  onFramingEvent(event: FramingEvent): void {
    const framing = this.framing;
    if (!framing) {
      this.logger.debug("event_before_negotiation", { connection: this.label, streamId: event.streamId });
      return;
    }
    this.dispatch(framing, event);
    this.transport.transmit();
  }

  /** Settles once every stream task started so far has settled. */
  async idle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  private dispatch(framing: HttpFraming<TEvent>, event: FramingEvent): void {
    switch (event.type) {
      case "request-received":
        this.requestReceived(framing, event);
        return;
      case "data-received":
        // Unknown streams were never opened or have already finished.
        this.handlers.get(event.streamId)?.onFramingEvent(event);
        return;
      case "stream-reset":
        this.streamReset(event);
        return;
      default: {
        const unknown: never = event;
        throw new Error(`Unhandled framing event: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private requestReceived(framing: HttpFraming<TEvent>, event: RequestReceivedEvent): void {
    const { streamId } = event;
    if (this.handlers.has(streamId) || this.retired.has(streamId)) {
      this.logger.debug("duplicate_request_ignored", { connection: this.label, streamId });
      return;
    }
    const { scope } = parseRequestHeaders(event.headers, framing.httpVersion);
    const context = {
      streamId,
      sink: framing,
      transport: this.transport,
      serverName: this.serverName
    };
    const handler: StreamHandler =
      scope.type === "websocket"
        ? new WebSocketHandler({ ...context, scope, createCodec: this.createCodec })
        : new RequestHandler({ ...context, scope });
    this.handlers.set(streamId, handler);
    this.logger.debug("stream_opened", {
      connection: this.label,
      streamId,
      type: scope.type,
      method: scope.method,
      path: scope.path
    });
    if (event.streamEnded) {
      handler.onFramingEvent({ type: "data-received", streamId, data: EMPTY_BODY, streamEnded: true });
    }
    this.schedule(handler);
  }

  private streamReset(event: StreamResetEvent): void {
    const handler = this.handlers.get(event.streamId);
    if (!handler) {
      return;
    }
    this.handlers.delete(event.streamId);
    this.retired.add(event.streamId);
    this.logger.debug("stream_reset", { connection: this.label, streamId: event.streamId, errorCode: event.errorCode });
    handler.abort();
  }

  private schedule(handler: StreamHandler): void {
    const { streamId } = handler;
    const task: Promise<void> = Promise.resolve()
      .then(() => handler.run(this.application))
      .then(
        () => {
          this.logger.debug("stream_completed", { connection: this.label, streamId });
        },
        (err: unknown) => {
          this.release(handler);
          this.logger.error("stream_failed", { connection: this.label, streamId }, err);
          this.reportStreamError(streamId, err);
        }
      )
      .finally(() => {
        this.release(handler);
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  private reportStreamError(streamId: number, err: unknown): void {
    if (!this.onStreamError) {
      return;
    }
    try {
      this.onStreamError(streamId, err);
    } catch (hookErr) {
      this.logger.error("stream_error_hook_failed", { connection: this.label, streamId }, hookErr);
    }
  }

  private release(handler: StreamHandler): void {
    if (this.handlers.get(handler.streamId) === handler) {
      this.handlers.delete(handler.streamId);
    }
    this.retired.add(handler.streamId);
  }
}
