export class StreamStateError extends Error {
  readonly code = "invalid_state";

  constructor(public streamId: number, message: string) {
    super(message);
    this.name = "StreamStateError";
  }
}

export class WebSocketProtocolError extends Error {
  readonly code = "protocol_error";

  constructor(public closeCode: number, message: string) {
    super(message);
    this.name = "WebSocketProtocolError";
  }
}

export class ConfigError extends Error {
  readonly code = "invalid_config";

  constructor(message: string, public issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export class ApplicationLoadError extends Error {
  readonly code = "app_load_failed";

  constructor(public specifier: string, message: string) {
    super(message);
    this.name = "ApplicationLoadError";
  }
}
