// packages/server/src/tests/helpers.ts

import Fastify from "fastify";
import WebSocket from "ws";
import type { IdentityId, PlatformNotice } from "@netplay/lobby";
import { loadConfig, type CoordinatorConfig } from "../config";
import type { Connection } from "../connectionRegistry";
import { Coordinator } from "../coordinator";
import type { ChatPlatform } from "../platform";

export const silentLogger = Fastify({ logger: false }).log;

export function flushMicrotasks() {
  return Promise.resolve().then(() => Promise.resolve());
}

export function testConfig(
  overrides: Record<string, string> = {}
): CoordinatorConfig {
  return loadConfig({
    LOG_LEVEL: "silent",
    PAIRING_SECRET: "test-secret",
    OAUTH_CLIENT_ID: "test-client",
    ...overrides,
  });
}

/** Records frames and closes instead of writing to a socket. */
export class FakeConnection implements Connection {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  readonly closes: Array<{ code?: number; reason?: string }> = [];

  send(data: string) {
    this.sent.push(data);
  }

  close(code?: number, reason?: string) {
    this.closes.push({ code, reason });
    this.readyState = WebSocket.CLOSED;
  }

  takeSent(): string[] {
    return this.sent.splice(0, this.sent.length);
  }
}

export class RecordingPlatform implements ChatPlatform {
  readonly notices: PlatformNotice[] = [];

  async publish(notice: PlatformNotice): Promise<void> {
    this.notices.push(notice);
  }

  ofType(type: PlatformNotice["type"]): PlatformNotice[] {
    return this.notices.filter((notice) => notice.type === type);
  }
}

/** Resume tokens are `resume-1`, `resume-2`, ... in confirm order. */
export function createTestCoordinator(
  options: { config?: CoordinatorConfig; platform?: ChatPlatform } = {}
) {
  const platform = new RecordingPlatform();
  let issued = 0;
  const coordinator = new Coordinator({
    config: options.config ?? testConfig(),
    logger: silentLogger,
    platform: options.platform ?? platform,
    generateToken: () => `resume-${++issued}`,
  });
  return { coordinator, platform };
}

/** Runs the whole pairing handshake and returns the bound connection. */
export async function pairConnection(
  coordinator: Coordinator,
  identityId: IdentityId,
  username: string
): Promise<FakeConnection> {
  const connection = new FakeConnection();
  const pairingId = coordinator.pairing.open(connection);
  const signedIn = await coordinator.pairing.signIn({ id: identityId, username });
  if (!signedIn.ok) throw new Error(`sign-in failed: ${signedIn.code}`);
  const confirmed = await coordinator.pairing.confirm(
    identityId,
    coordinator.pairing.codeFor(pairingId)
  );
  if (!confirmed.ok) throw new Error(`confirm failed: ${confirmed.code}`);
  connection.takeSent();
  return connection;
}

export async function sendFrames(
  coordinator: Coordinator,
  connection: Connection,
  frames: string[]
) {
  for (const frame of frames) {
    await coordinator.dispatcher.handleFrame(connection, frame);
  }
}
