// packages/server/src/logger.ts

import type { FastifyBaseLogger } from "fastify";

const COORDINATOR_DEBUG =
  process.env.COORDINATOR_DEBUG === "1" || process.env.COORDINATOR_DEBUG === "true";

function ts() {
  return new Date().toISOString();
}

const INFO_TAGS = new Set([
  "pairing:open",
  "pairing:confirmed",
  "pairing:expired",
  "pairing:sign_in",
  "pairing:sign_in_expired",
  "session:reconnect",
  "session:disconnect",
  "lobby:create",
  "lobby:join",
  "lobby:leave",
  "lobby:start",
  "lobby:drop",
  "lobby:roster_ready",
]);

const WARN_TAGS = new Set([
  "protocol:malformed",
  "protocol:rejected",
  "ws:payload_too_large",
  "ws:rate_limited",
  "platform:delivery_failed",
]);

export type LogEntry = { tag: string } & Record<string, unknown>;

export function logCoordinator(logger: FastifyBaseLogger, entry: LogEntry) {
  const payload = { ts: ts(), ...entry };
  try {
    if (entry.tag.endsWith(":error")) {
      logger.error(payload);
      return;
    }
    if (WARN_TAGS.has(entry.tag)) {
      logger.warn(payload);
      return;
    }
    if (INFO_TAGS.has(entry.tag)) {
      logger.info(payload);
      return;
    }
    if (COORDINATOR_DEBUG) {
      logger.info(payload);
    } else {
      logger.debug(payload);
    }
  } catch (e) {
    try {
      logger.error({ tag: "log:error", ts: ts(), message: "logging failed", err: String(e) });
    } catch {
      // nothing left to report to
    }
  }
}
