import { z } from "zod";

import { ConfigError } from "./errors";
import { DEFAULT_MAX_PAYLOAD_BYTES } from "./ws-codec";

export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  tls: z
    .object({
      certificatePath: z.string().min(1).nullable(),
      privateKeyPath: z.string().min(1).nullable()
    })
    .refine((tls) => (tls.certificatePath === null) === (tls.privateKeyPath === null), {
      message: "certificatePath and privateKeyPath must be set together"
    }),
  secretsLogPath: z.string().min(1).nullable(),
  eventLogPath: z.string().min(1).nullable(),
  serverName: z.string().min(1),
  websocket: z.object({
    maxPayloadBytes: z.number().int().positive()
  }),
  shutdownTimeoutMs: z.number().int().nonnegative()
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export type ConfigOverrides = {
  [K in keyof ServerConfig]?: ServerConfig[K] extends object ? Partial<ServerConfig[K]> : ServerConfig[K];
};

export const DEFAULT_CONFIG: ServerConfig = {
  host: "::",
  port: 4433,
  tls: {
    certificatePath: null,
    privateKeyPath: null
  },
  secretsLogPath: null,
  eventLogPath: null,
  serverName: "streamgate",
  websocket: {
    maxPayloadBytes: DEFAULT_MAX_PAYLOAD_BYTES
  },
  shutdownTimeoutMs: 5_000
};

export function mergeConfig(overrides: ConfigOverrides = {}): ServerConfig {
  const candidate = deepMerge(DEFAULT_CONFIG, overrides);
  const result = ServerConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      "Invalid server configuration",
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return result.data;
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const current = merged[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      merged[key] = deepMerge(current, value);
    } else if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
