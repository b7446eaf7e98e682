import type { Application, DataReceivedEvent, HeaderList, Scope, Transport } from "./types";

/** The outbound half of a framing layer, which is all a handler writes to. */
export interface FrameSink {
  sendHeaders(streamId: number, headers: HeaderList): void;
  sendData(streamId: number, data: Buffer, endStream: boolean): void;
}

export type HandlerContext<S extends Scope> = {
  streamId: number;
  scope: S;
  sink: FrameSink;
  transport: Transport;
  serverName: string;
};

export interface StreamHandler {
  readonly streamId: number;
  readonly scope: Scope;
  onFramingEvent(event: DataReceivedEvent): void;
  /** The stream was reset underneath the application. */
  abort(): void;
  run(application: Application): Promise<void>;
}

export const EMPTY_BODY = Buffer.alloc(0);
