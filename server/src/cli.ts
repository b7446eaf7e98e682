/**
 * Command-line entry point: serves an application over HTTP/2.
 */

import path from "node:path";
import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import { z } from "zod";

import type { ConfigOverrides } from "./config";
import { demoApplication } from "./demo";
import { ApplicationLoadError, ConfigError } from "./errors";
import { createConsoleLogger } from "./logger";
import { createStreamServer } from "./server";
import type { Application } from "./types";

const CliOptionsSchema = z.object({
  certificate: z.string().min(1).optional(),
  privateKey: z.string().min(1).optional(),
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  secretsLog: z.string().min(1).optional(),
  eventLog: z.string().min(1).optional(),
  verbose: z.boolean().default(false)
});

export type CommandLine = {
  app: string;
  verbose: boolean;
  config: ConfigOverrides;
};

export function buildProgram(): Command {
  return new Command()
    .name("streamgate")
    .description("Serve an ASGI-style application over HTTP/2, with WebSockets over extended CONNECT")
    .argument("[app]", 'the application as <module>:<export>, or "demo"', "demo")
    .option("-c, --certificate <path>", "load the TLS certificate from the specified file")
    .option("-k, --private-key <path>", "load the TLS private key from the specified file")
    .option("--host <host>", "listen on the specified address", "::")
    .option("--port <port>", "listen on the specified port", "4433")
    .option("-l, --secrets-log <path>", "log TLS secrets to a file, for use with Wireshark")
    .option("-q, --event-log <path>", "write protocol events to a JSON file on exit")
    .option("-v, --verbose", "increase logging verbosity")
    .exitOverride();
}

export function parseCommandLine(argv: string[]): CommandLine {
  const program = buildProgram();
  program.parse(argv, { from: "user" });
  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid command line",
      parsed.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const options = parsed.data;
  const [app] = program.processedArgs;
  return {
    app: typeof app === "string" ? app : "demo",
    verbose: options.verbose,
    config: {
      host: options.host,
      port: options.port,
      tls: {
        certificatePath: options.certificate ?? null,
        privateKeyPath: options.privateKey ?? null
      },
      secretsLogPath: options.secretsLog ?? null,
      eventLogPath: options.eventLog ?? null
    }
  };
}

function isApplication(value: unknown): value is Application {
  return typeof value === "function";
}

/** Resolves `demo` or `<module>:<export>` relative to the working directory. */
export async function loadApplication(specifier: string): Promise<Application> {
  if (specifier === "demo") {
    return demoApplication;
  }
  const separator = specifier.lastIndexOf(":");
  if (separator <= 0 || separator === specifier.length - 1) {
    throw new ApplicationLoadError(specifier, `Expected <module>:<export>, got "${specifier}"`);
  }
  const modulePath = specifier.slice(0, separator);
  const exportName = specifier.slice(separator + 1);
  let loaded: Record<string, unknown>;
  try {
    loaded = await import(pathToFileURL(path.resolve(modulePath)).href);
  } catch (err) {
    throw new ApplicationLoadError(specifier, `Cannot import ${modulePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const candidate = loaded[exportName];
  if (!isApplication(candidate)) {
    throw new ApplicationLoadError(specifier, `Export "${exportName}" of ${modulePath} is not a function`);
  }
  return candidate;
}

export async function main(argv: string[]): Promise<void> {
  const commandLine = parseCommandLine(argv);
  const logger = createConsoleLogger({ verbose: commandLine.verbose });
  const application = await loadApplication(commandLine.app);
  const server = await createStreamServer({ config: commandLine.config, application, logger });
  await server.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down streamgate...");
    await server.stop();
    if (server.config.eventLogPath) {
      await server.eventLog.writeTo(server.config.eventLogPath);
      logger.info(`Wrote ${server.eventLog.size} protocol events to ${server.config.eventLogPath}`);
    }
  };
  const onSignal = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error("shutdown_failed", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(path.resolve(entry)).href;
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).catch((err) => {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    console.error("Failed to start streamgate:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
