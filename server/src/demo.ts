import type { Application, HttpScope, Receive, Send, WebSocketScope } from "./types";

const HELLO = Buffer.from("hello from streamgate\n", "utf8");
const NOT_FOUND = Buffer.from("not found\n", "utf8");

/**
 * Built-in application served when no other is named on the command line.
 *
 *   GET  /      plain-text greeting
 *   POST /echo  streams the request body back
 *   WS   /ws    echoes every text and binary message
 */
export const demoApplication: Application = async (scope, receive, send) => {
  if (scope.type === "websocket") {
    await websocketEcho(scope, receive, send);
    return;
  }
  await httpRoutes(scope, receive, send);
};

async function httpRoutes(scope: HttpScope, receive: Receive, send: Send): Promise<void> {
  if (scope.path === "/" && (scope.method === "GET" || scope.method === "HEAD")) {
    await send({
      type: "http.response.start",
      status: 200,
      headers: [
        ["content-type", "text/plain; charset=utf-8"],
        ["content-length", String(HELLO.length)]
      ]
    });
    if (scope.method === "GET") {
      await send({ type: "http.response.body", body: HELLO });
    }
    return;
  }

  if (scope.path === "/echo" && scope.method === "POST") {
    await send({ type: "http.response.start", status: 200, headers: [["content-type", "application/octet-stream"]] });
    for (;;) {
      const message = await receive();
      if (message.type !== "http.request") {
        return;
      }
      if (message.body.length > 0) {
        await send({ type: "http.response.body", body: message.body });
      }
      if (!message.moreBody) {
        return;
      }
    }
  }

  await send({
    type: "http.response.start",
    status: 404,
    headers: [["content-type", "text/plain; charset=utf-8"]]
  });
  await send({ type: "http.response.body", body: NOT_FOUND });
}

async function websocketEcho(scope: WebSocketScope, receive: Receive, send: Send): Promise<void> {
  const first = await receive();
  if (first.type !== "websocket.connect") {
    return;
  }
  if (scope.path !== "/ws") {
    await send({ type: "websocket.close" });
    return;
  }
  const subprotocol = scope.subprotocols[0];
  await send(subprotocol !== undefined ? { type: "websocket.accept", subprotocol } : { type: "websocket.accept" });

  for (;;) {
    const message = await receive();
    if (message.type !== "websocket.receive") {
      return;
    }
    if (message.text !== undefined) {
      await send({ type: "websocket.send", text: message.text });
    } else {
      await send({ type: "websocket.send", bytes: message.bytes });
    }
  }
}
