// packages/server/src/platform.ts

import type { FastifyBaseLogger } from "fastify";
import type { PlatformNotice } from "@netplay/lobby";
import { logCoordinator } from "./logger";

/**
 * Outbound port to the chat platform that hosts the command surface: it DMs
 * users, opens and tears down lobby threads, and renders roster summaries.
 */
export interface ChatPlatform {
  publish(notice: PlatformNotice): Promise<void>;
}

export class LoggingChatPlatform implements ChatPlatform {
  constructor(private readonly logger: FastifyBaseLogger) {}

  async publish(notice: PlatformNotice): Promise<void> {
    logCoordinator(this.logger, { tag: `platform:${notice.type}`, notice });
  }
}

/** POSTs every notice as JSON to a bot-side webhook. */
export class WebhookChatPlatform implements ChatPlatform {
  constructor(
    private readonly url: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async publish(notice: PlatformNotice): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(notice),
    });
    if (!response.ok) {
      throw new Error(
        `chat webhook rejected ${notice.type}: ${response.status} ${response.statusText}`
      );
    }
  }
}
