import http2, { type ServerHttp2Session, type ServerHttp2Stream } from "node:http2";
import type { Server as NetServer } from "node:net";
import { constants as cryptoConstants } from "node:crypto";
import fs from "node:fs/promises";
import { createWriteStream, type WriteStream } from "node:fs";

import { mergeConfig, type ConfigOverrides, type ServerConfig } from "./config";
import { HttpServerConnection } from "./connection";
import { ProtocolEventLog } from "./event-log";
import { createHttp2Framing, type Http2TransportEvent } from "./http2-framing";
import { TicketCache } from "./ticket-cache";
import type { Application, Logger } from "./types";
import { createServerCodec } from "./ws-codec";

export interface StreamServerOptions {
  config?: ConfigOverrides;
  application: Application;
  logger?: Logger;
}

export interface StreamServer {
  readonly config: ServerConfig;
  readonly tickets: TicketCache;
  readonly eventLog: ProtocolEventLog;
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number;
}

const HTTP2_ALPN_VARIANTS = { h2: "full", h2c: "full" } as const;

export async function createStreamServer(options: StreamServerOptions): Promise<StreamServer> {
  const config = mergeConfig(options.config);
  const logger: Logger = options.logger ?? console;
  const tickets = new TicketCache();
  const eventLog = new ProtocolEventLog();
  const sessions = new Set<ServerHttp2Session>();
  const connections = new Set<HttpServerConnection<Http2TransportEvent>>();
  let connectionCounter = 0;
  let secretsLog: WriteStream | null = null;

  const settings: http2.Settings = { enableConnectProtocol: true };
  const { certificatePath, privateKeyPath } = config.tls;
  let server: NetServer;
  if (certificatePath !== null && privateKeyPath !== null) {
    const [cert, key] = await Promise.all([fs.readFile(certificatePath), fs.readFile(privateKeyPath)]);
    // Sessions resume from the ticket cache rather than from stateless tickets.
    const secureServer = http2.createSecureServer({
      cert,
      key,
      settings,
      ALPNProtocols: ["h2"],
      secureOptions: cryptoConstants.SSL_OP_NO_TICKET
    });
    const storeTicket = tickets.handler();
    const fetchTicket = tickets.fetcher();
    secureServer.on("newSession", (sessionId: Buffer, sessionData: Buffer, done: () => void) => {
      storeTicket({ label: sessionId, data: sessionData });
      done();
    });
    secureServer.on(
      "resumeSession",
      (sessionId: Buffer, done: (err: Error | null, sessionData: Buffer | null) => void) => {
        done(null, fetchTicket(sessionId)?.data ?? null);
      }
    );
    secureServer.on("keylog", (line: Buffer) => {
      secretsLog?.write(line);
    });
    secureServer.on("session", bindSession);
    server = secureServer;
  } else {
    const plainServer = http2.createServer({ settings });
    plainServer.on("session", bindSession);
    server = plainServer;
  }

  function bindSession(session: ServerHttp2Session) {
    const label = `c${++connectionCounter}`;
    const framing = createHttp2Framing();
    const connection = new HttpServerConnection<Http2TransportEvent>({
      application: options.application,
      // The session writes its own frames; there is no output queue to flush.
      transport: { transmit: () => {} },
      framings: { full: () => framing },
      alpnVariants: HTTP2_ALPN_VARIANTS,
      serverName: config.serverName,
      createCodec: () => createServerCodec({ maxPayloadBytes: config.websocket.maxPayloadBytes }),
      logger,
      label,
      onStreamError: (streamId) => {
        eventLog.record(label, "stream_failed", { streamId });
        framing.reset(streamId);
      }
    });
    sessions.add(session);
    connections.add(connection);

    const alpn = session.alpnProtocol ?? "h2c";
    eventLog.record(label, "connection_started", { alpn });
    connection.onTransportNegotiated(alpn);

    session.on("stream", (stream: ServerHttp2Stream, headers: http2.IncomingHttpHeaders, flags: number) => {
      bindStream(label, connection, stream, headers, (flags & http2.constants.NGHTTP2_FLAG_END_STREAM) !== 0);
    });
    session.on("error", (err) => {
      logger.warn("session_error", { connection: label }, err);
    });
    session.once("close", () => {
      sessions.delete(session);
      eventLog.record(label, "connection_closed", { activeStreams: connection.activeStreamCount });
      connection
        .idle()
        .then(() => connections.delete(connection))
        .catch((err) => logger.error("connection_drain_failed", { connection: label }, err));
    });
  }

  function bindStream(
    label: string,
    connection: HttpServerConnection<Http2TransportEvent>,
    stream: ServerHttp2Stream,
    headers: http2.IncomingHttpHeaders,
    endStream: boolean
  ) {
    const streamId = stream.id;
    eventLog.record(label, "stream_opened", {
      streamId,
      method: headers[":method"],
      path: headers[":path"],
      protocol: headers[":protocol"]
    });
    connection.onTransportEvent({ type: "stream", stream, headers, endStream });
    stream.on("data", (chunk: Buffer | string) => {
      connection.onTransportEvent({ type: "data", stream, chunk: typeof chunk === "string" ? Buffer.from(chunk) : chunk });
    });
    stream.on("end", () => connection.onTransportEvent({ type: "end", stream }));
    stream.on("error", (err) => {
      logger.warn("stream_error", { connection: label, streamId }, err);
    });
    stream.on("close", () => {
      const errorCode = stream.rstCode;
      eventLog.record(label, "stream_closed", { streamId, errorCode });
      // A handler still registered at close never saw its stream finish.
      if (errorCode !== http2.constants.NGHTTP2_NO_ERROR || (streamId !== undefined && connection.hasStream(streamId))) {
        connection.onTransportEvent({ type: "reset", stream, errorCode });
      }
    });
  }

  let started = false;

  return {
    config,
    tickets,
    eventLog,
    async start(this: StreamServer) {
      if (started) return;
      if (config.secretsLogPath) {
        secretsLog = createWriteStream(config.secretsLogPath, { flags: "a" });
      }
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
      started = true;
      logger.info(`streamgate listening on ${config.host}:${this.getPort()}`);
    },
    async stop() {
      if (!started) return;
      const closing = [...sessions].map(
        (session) =>
          new Promise<void>((resolve) => {
            if (session.closed || session.destroyed) {
              resolve();
            } else {
              session.close(() => resolve());
            }
          })
      );
      const forceTimer = setTimeout(() => {
        for (const session of sessions) {
          session.destroy();
        }
      }, config.shutdownTimeoutMs);
      forceTimer.unref();
      await Promise.all(closing);
      clearTimeout(forceTimer);
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      await Promise.all([...connections].map((connection) => connection.idle()));
      if (secretsLog) {
        const stream = secretsLog;
        secretsLog = null;
        await new Promise<void>((resolve) => stream.end(() => resolve()));
      }
      started = false;
    },
    getPort() {
      const addr = server.address();
      if (!addr || typeof addr === "string") {
        return config.port;
      }
      return addr.port;
    }
  };
}
