export { ALPN_VARIANTS, DEFAULT_SERVER_NAME, HttpServerConnection, RetiredStreamIds, type ConnectionOptions } from "./connection";
export { EMPTY_BODY, type FrameSink, type HandlerContext, type StreamHandler } from "./handler";
export { RequestHandler, type RequestState } from "./request-handler";
export { WebSocketHandler, type WebSocketHandlerContext, type WebSocketState } from "./websocket-handler";
export { Mailbox } from "./mailbox";
export { TicketCache } from "./ticket-cache";
export { formatHttpDate, parseRequestHeaders, responseHeaders, splitRawPath, type ParsedRequest } from "./headers";
export {
  CloseCode,
  DEFAULT_MAX_PAYLOAD_BYTES,
  ServerWebSocketCodec,
  createServerCodec,
  type WebSocketCodec,
  type WebSocketCodecOptions,
  type WebSocketEvent
} from "./ws-codec";
export {
  Http2Framing,
  createHttp2Framing,
  toHeaderList,
  toOutgoingHeaders,
  type Http2TransportEvent
} from "./http2-framing";
export { createStreamServer, type StreamServer, type StreamServerOptions } from "./server";
export { DEFAULT_CONFIG, ServerConfigSchema, mergeConfig, type ConfigOverrides, type ServerConfig } from "./config";
export { ApplicationLoadError, ConfigError, StreamStateError, WebSocketProtocolError } from "./errors";
export { createConsoleLogger, silentLogger } from "./logger";
export { ProtocolEventLog, type ProtocolEvent } from "./event-log";
export { demoApplication } from "./demo";
export type {
  Application,
  DataReceivedEvent,
  FramingEvent,
  FramingFactory,
  FramingVariant,
  Header,
  HeaderList,
  HttpFraming,
  HttpReceiveMessage,
  HttpScope,
  HttpSendMessage,
  Logger,
  Receive,
  ReceiveMessage,
  RequestReceivedEvent,
  Scope,
  Send,
  SendMessage,
  StreamResetEvent,
  Ticket,
  Transport,
  WebSocketReceiveEvent,
  WebSocketScope,
  WebSocketSendEvent
} from "./types";
