export type Header = [name: string, value: string];
export type HeaderList = Header[];

export type FramingVariant = "full" | "minimal";

export type HttpScope = Readonly<{
  type: "http";
  httpVersion: string;
  method: string;
  scheme: "https";
  path: string;
  queryString: string;
  rawPath: string;
  rootPath: string;
  headers: readonly Header[];
}>;

export type WebSocketScope = Readonly<{
  type: "websocket";
  httpVersion: string;
  method: string;
  scheme: "wss";
  path: string;
  queryString: string;
  rawPath: string;
  rootPath: string;
  headers: readonly Header[];
  subprotocols: readonly string[];
}>;

export type Scope = HttpScope | WebSocketScope;

export type HttpRequestMessage = { type: "http.request"; body: Buffer; moreBody: boolean };
export type HttpDisconnectMessage = { type: "http.disconnect" };

export type WebSocketConnectMessage = { type: "websocket.connect" };
export type WebSocketReceiveMessage =
  | { type: "websocket.receive"; text: string; bytes?: undefined }
  | { type: "websocket.receive"; bytes: Buffer; text?: undefined };
export type WebSocketDisconnectMessage = { type: "websocket.disconnect"; code: number };

export type HttpReceiveMessage = HttpRequestMessage | HttpDisconnectMessage;
export type WebSocketReceiveEvent = WebSocketConnectMessage | WebSocketReceiveMessage | WebSocketDisconnectMessage;
export type ReceiveMessage = HttpReceiveMessage | WebSocketReceiveEvent;

export type HttpResponseStartMessage = { type: "http.response.start"; status: number; headers?: HeaderList };
export type HttpResponseBodyMessage = { type: "http.response.body"; body?: Buffer };

export type WebSocketAcceptMessage = { type: "websocket.accept"; subprotocol?: string; headers?: HeaderList };
export type WebSocketSendMessage =
  | { type: "websocket.send"; text: string; bytes?: undefined }
  | { type: "websocket.send"; bytes: Buffer; text?: undefined };
export type WebSocketCloseMessage = { type: "websocket.close"; code?: number; reason?: string };

export type HttpSendMessage = HttpResponseStartMessage | HttpResponseBodyMessage;
export type WebSocketSendEvent = WebSocketAcceptMessage | WebSocketSendMessage | WebSocketCloseMessage;
export type SendMessage = HttpSendMessage | WebSocketSendEvent;

export type Receive = () => Promise<ReceiveMessage>;
export type Send = (message: SendMessage) => Promise<void>;

/**
 * An ASGI-shaped application. It is invoked once per stream and owns the
 * exchange until its promise settles.
 */
export type Application = (scope: Scope, receive: Receive, send: Send) => Promise<void>;

export type RequestReceivedEvent = {
  type: "request-received";
  streamId: number;
  headers: HeaderList;
  streamEnded: boolean;
};

export type DataReceivedEvent = {
  type: "data-received";
  streamId: number;
  data: Buffer;
  streamEnded: boolean;
};

export type StreamResetEvent = {
  type: "stream-reset";
  streamId: number;
  errorCode: number;
};

export type FramingEvent = RequestReceivedEvent | DataReceivedEvent | StreamResetEvent;

/**
 * The HTTP framing layer for one connection. It decodes transport events
 * into framing events and queues outbound frames until the transport is
 * asked to transmit.
 */
export interface HttpFraming<TEvent> {
  readonly variant: FramingVariant;
  readonly httpVersion: string;
  handleEvent(event: TEvent): FramingEvent[];
  sendHeaders(streamId: number, headers: HeaderList): void;
  sendData(streamId: number, data: Buffer, endStream: boolean): void;
}

export interface Transport {
  transmit(): void;
}

export type FramingFactory<TEvent> = () => HttpFraming<TEvent>;

export type Ticket = {
  label: Buffer;
  data: Buffer;
};

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};
