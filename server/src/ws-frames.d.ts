// `ws` exports its frame receiver and sender at runtime; @types/ws leaves them out.
export {};

declare module "ws" {
  interface ReceiverOptions {
    allowSynchronousEvents?: boolean;
    binaryType?: "nodebuffer" | "arraybuffer" | "fragments";
    isServer?: boolean;
    maxPayload?: number;
    skipUTF8Validation?: boolean;
  }

  class Receiver {
    constructor(options?: ReceiverOptions);
    readonly errored: Error | null;
    write(chunk: Buffer): boolean;
    on(event: "message", listener: (data: Buffer, isBinary: boolean) => void): this;
    on(event: "ping" | "pong", listener: (data: Buffer) => void): this;
    on(event: "conclude", listener: (code: number, reason: Buffer) => void): this;
    on(event: "error", listener: (err: Error) => void): this;
  }

  interface FrameOptions {
    fin: boolean;
    opcode: number;
    mask: boolean;
    readOnly: boolean;
    rsv1: boolean;
  }

  class Sender {
    static frame(data: Buffer, options: FrameOptions): Buffer[];
  }
}
