/**
 * Pino logger shared by the library.
 *
 * - Level from `SITEPASS_LOG_LEVEL`; silent under `NODE_ENV=test`, `info` otherwise
 * - Redaction of secret-bearing keys, so a stray field never reaches the sink
 * - Child loggers per module
 */
import pino, { type Logger } from "pino";

const REDACT_KEYS = ["secret", "masterSecret", "password", "verifier", "salt"] as const;

function resolveLevel(): string {
  const configured = process.env.SITEPASS_LOG_LEVEL;
  if (configured) return configured;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger: Logger = pino({
  level: resolveLevel(),
  base: { lib: "sitepass" },
  redact: {
    paths: [...REDACT_KEYS, ...REDACT_KEYS.map((key) => `*.${key}`)],
    censor: "[REDACTED]"
  },
  serializers: {
    err: pino.stdSerializers.err
  }
});

export type { Logger };

export function moduleLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
