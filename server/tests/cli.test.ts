import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { CommanderError } from "commander";

import { buildProgram, loadApplication, parseCommandLine } from "../src/cli";
import { ApplicationLoadError, ConfigError, demoApplication } from "../src/index";

const fixture = fileURLToPath(new URL("./fixtures/echo-app.ts", import.meta.url));

describe("parseCommandLine", () => {
  it("falls back to the demo application and default listener", () => {
    expect(parseCommandLine([])).toEqual({
      app: "demo",
      verbose: false,
      config: {
        host: "::",
        port: 4433,
        tls: { certificatePath: null, privateKeyPath: null },
        secretsLogPath: null,
        eventLogPath: null
      }
    });
  });

  it("maps every flag onto the server configuration", () => {
    const commandLine = parseCommandLine([
      "./apps/chat.ts:app",
      "-c",
      "cert.pem",
      "-k",
      "key.pem",
      "--host",
      "127.0.0.1",
      "--port",
      "8443",
      "-l",
      "secrets.log",
      "-q",
      "events.json",
      "-v"
    ]);
    expect(commandLine).toEqual({
      app: "./apps/chat.ts:app",
      verbose: true,
      config: {
        host: "127.0.0.1",
        port: 8443,
        tls: { certificatePath: "cert.pem", privateKeyPath: "key.pem" },
        secretsLogPath: "secrets.log",
        eventLogPath: "events.json"
      }
    });
  });

  it("accepts the long option names", () => {
    const commandLine = parseCommandLine(["--certificate", "c.pem", "--private-key", "k.pem", "--event-log", "e.json"]);
    expect(commandLine.config.tls).toEqual({ certificatePath: "c.pem", privateKeyPath: "k.pem" });
    expect(commandLine.config.eventLogPath).toBe("e.json");
  });

  it("rejects a port that is not a number in range", () => {
    expect(() => parseCommandLine(["--port", "http"])).toThrow(ConfigError);
    expect(() => parseCommandLine(["--port", "65536"])).toThrow(ConfigError);
  });

  it("reports unknown options through commander", () => {
    const program = buildProgram().configureOutput({ writeErr: () => {} });
    expect(() => program.parse(["--stateless-retry"], { from: "user" })).toThrow(CommanderError);
  });
});

describe("loadApplication", () => {
  it("returns the built-in demo", async () => {
    expect(await loadApplication("demo")).toBe(demoApplication);
  });

  it("imports a named export from a module path", async () => {
    const application = await loadApplication(`${fixture}:app`);
    expect(typeof application).toBe("function");
  });

  it("rejects specifiers without an export name", async () => {
    await expect(loadApplication("server.ts")).rejects.toBeInstanceOf(ApplicationLoadError);
    await expect(loadApplication("server.ts:")).rejects.toBeInstanceOf(ApplicationLoadError);
  });

  it("rejects exports that are not applications", async () => {
    await expect(loadApplication(`${fixture}:notAnApplication`)).rejects.toThrow(
      `Export "notAnApplication" of ${fixture} is not a function`
    );
  });

  it("rejects modules that cannot be imported", async () => {
    await expect(loadApplication("./does-not-exist/app.ts:app")).rejects.toBeInstanceOf(ApplicationLoadError);
  });
});
