// packages/server/src/dispatcher.ts

import { parseInboundFrame } from "@netplay/lobby";
import { rejected, type CommandResult } from "./commandResult";
import type { Connection } from "./connectionRegistry";
import type { Coordinator } from "./coordinator";
import { logCoordinator } from "./logger";

/**
 * Routes inbound text frames by their literal prefix. Returns `null` for
 * frames that are ignored (unknown tag, wrong connection stage).
 */
export class ProtocolDispatcher {
  constructor(private readonly coordinator: Coordinator) {}

  async handleFrame(
    connection: Connection,
    raw: string
  ): Promise<CommandResult | null> {
    const meta = this.coordinator.metaOf(connection);
    if (!meta) return null;
    const logger = this.coordinator.logger;

    const parsed = parseInboundFrame(raw);
    if (!parsed.ok) {
      if (parsed.reason === "unknown_tag") {
        logCoordinator(logger, { tag: "protocol:unknown_tag", head: raw.slice(0, 32) });
        return null;
      }
      logCoordinator(logger, {
        tag: "protocol:malformed",
        frame: parsed.tag,
        message: parsed.message,
      });
      return rejected("MALFORMED_TELEMETRY", parsed.message);
    }

    const frame = parsed.frame;
    logCoordinator(logger, { tag: "protocol:incoming", kind: meta.kind, frame: frame.tag });

    if (meta.kind === "anonymous") {
      if (frame.tag !== "START AUTH") return null;
      this.coordinator.pairing.startAuth(connection);
      return null;
    }

    switch (frame.tag) {
      case "START AUTH":
        return null;
      case "LOGOUT":
        return this.coordinator.logout(meta.identityId, connection);
      default: {
        const result = await this.coordinator.dispatch({
          type: "telemetry",
          identityId: meta.identityId,
          frame,
        });
        if (!result.ok) {
          logCoordinator(logger, {
            tag: "protocol:rejected",
            identityId: meta.identityId,
            frame: frame.tag,
            code: result.code,
          });
        }
        return result;
      }
    }
  }
}
