// packages/server/src/coordinator.ts

import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import {
  MESSAGES,
  applyAction,
  createEmptyState,
  formatOutboundFrame,
  listLobbySummaries,
  type CoordinatorAction,
  type CoordinatorState,
  type Effect,
  type IdentityId,
  type LobbySummary,
  type PlatformNotice,
} from "@netplay/lobby";
import { CommandQueue, STATE_QUEUE_KEY } from "./commandQueue";
import {
  accepted,
  rejected,
  type CommandRejected,
  type CommandResult,
} from "./commandResult";
import type { CoordinatorConfig } from "./config";
import {
  ConnectionRegistry,
  isOpen,
  sendText,
  type Connection,
} from "./connectionRegistry";
import { ProtocolDispatcher } from "./dispatcher";
import { LobbyController } from "./lobbyController";
import { logCoordinator } from "./logger";
import { AuthPairingCoordinator } from "./pairing";
import type { PairingId } from "./pairingCode";
import type { ChatPlatform } from "./platform";

export type ConnectionMeta =
  | { kind: "anonymous"; pairingId: PairingId }
  | { kind: "authenticated"; identityId: IdentityId };

export interface DispatchHooks {
  /** Runs inside the queued task before the reducer; a rejection aborts. */
  guard?: () => CommandRejected | null;
  /** Runs inside the queued task right after the new state is committed. */
  onCommit?: (state: CoordinatorState) => void;
  /** Runs inside the queued task once the committed frames are sent. */
  afterFrames?: () => void;
}

export interface CoordinatorDeps {
  config: CoordinatorConfig;
  logger: FastifyBaseLogger;
  platform: ChatPlatform;
  now?: () => number;
  generateToken?: () => string;
}

export const SUPERSEDED_CLOSE_CODE = 4000;
export const LOGOUT_CLOSE_CODE = 1000;

type Committed = { ok: true; notices: PlatformNotice[] } | CommandRejected;

/**
 * Owns every piece of mutable coordinator state: the identity/lobby tables,
 * both connection registries and the command queue. Created once per server
 * and stopped with it.
 */
export class Coordinator {
  readonly config: CoordinatorConfig;
  readonly logger: FastifyBaseLogger;
  readonly platform: ChatPlatform;
  readonly now: () => number;
  private readonly generateToken: () => string;

  readonly anonymous = new ConnectionRegistry<PairingId>();
  readonly authenticated = new ConnectionRegistry<IdentityId>();
  readonly queue = new CommandQueue();

  readonly pairing: AuthPairingCoordinator;
  readonly lobbies: LobbyController;
  readonly dispatcher: ProtocolDispatcher;

  private state: CoordinatorState = createEmptyState();
  private readonly connectionMeta = new Map<Connection, ConnectionMeta>();
  private readonly resumeTokens = new Map<IdentityId, string>();

  constructor(deps: CoordinatorDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.platform = deps.platform;
    this.now = deps.now ?? Date.now;
    this.generateToken = deps.generateToken ?? randomUUID;

    this.pairing = new AuthPairingCoordinator(this);
    this.lobbies = new LobbyController(this);
    this.dispatcher = new ProtocolDispatcher(this);
  }

  snapshot(): CoordinatorState {
    return this.state;
  }

  listLobbies(): LobbySummary[] {
    return listLobbySummaries(this.state);
  }

  metaOf(connection: Connection): ConnectionMeta | null {
    return this.connectionMeta.get(connection) ?? null;
  }

  setMeta(connection: Connection, meta: ConnectionMeta) {
    this.connectionMeta.set(connection, meta);
  }

  /**
   * Applies one action under the state queue. Frames go out inside the
   * queued task, right after the commit; platform notices are published
   * after the task has released the queue.
   */
  async dispatch(
    action: CoordinatorAction,
    hooks: DispatchHooks = {}
  ): Promise<CommandResult> {
    const committed = await this.queue.enqueue(STATE_QUEUE_KEY, () =>
      this.commit(action, hooks)
    );
    if (!committed.ok) return committed;

    for (const notice of committed.notices) {
      await this.publishNotice(notice);
    }
    return accepted();
  }

  private commit(action: CoordinatorAction, hooks: DispatchHooks): Committed {
    const blocked = hooks.guard?.() ?? null;
    if (blocked) return blocked;

    const result = applyAction(this.state, action, this.now());
    if (!result.ok) return rejected(result.code, result.message);

    this.state = result.state;
    hooks.onCommit?.(result.state);
    const notices = this.sendFrames(result.effects);
    hooks.afterFrames?.();
    return { ok: true, notices };
  }

  private sendFrames(effects: Effect[]): PlatformNotice[] {
    const notices: PlatformNotice[] = [];
    for (const effect of effects) {
      if (effect.kind === "notice") {
        notices.push(effect.notice);
        continue;
      }
      const delivered = this.authenticated.send(
        effect.to,
        formatOutboundFrame(effect.frame)
      );
      if (!delivered) {
        logCoordinator(this.logger, {
          tag: "frame:undelivered",
          identityId: effect.to,
          frame: effect.frame.tag,
        });
      }
    }
    return notices;
  }

  private async publishNotice(notice: PlatformNotice) {
    if (notice.type === "rosterReady") {
      logCoordinator(this.logger, {
        tag: "lobby:roster_ready",
        lobbyId: notice.lobbyId,
        members: notice.roster.length,
      });
    }
    try {
      await this.platform.publish(notice);
    } catch (err) {
      logCoordinator(this.logger, {
        tag: "platform:delivery_failed",
        notice: notice.type,
        err: String(err),
      });
    }
  }

  /** Registers `connection` as the identity's only live connection. */
  bindAuthenticated(identityId: IdentityId, connection: Connection) {
    const previous = this.authenticated.connect(identityId, connection);
    this.connectionMeta.set(connection, { kind: "authenticated", identityId });
    if (previous) {
      this.connectionMeta.delete(previous);
      previous.close(SUPERSEDED_CLOSE_CODE, "superseded");
    }
  }

  /** A fresh token per confirmed pairing; the previous one stops working. */
  issueResumeToken(identityId: IdentityId): string {
    const token = this.generateToken();
    this.resumeTokens.set(identityId, token);
    return token;
  }

  /**
   * Reconnect path for an identity that already completed pairing. The
   * caller must present the resume token sent after `AUTH SUCCESS`.
   */
  async reattach(
    identityId: IdentityId,
    resumeToken: string,
    connection: Connection
  ): Promise<CommandResult> {
    const outcome = await this.queue.enqueue(
      STATE_QUEUE_KEY,
      (): CommandResult => {
        const identity = this.state.identities[identityId];
        if (
          !identity ||
          identity.authState !== "AUTHENTICATED" ||
          this.resumeTokens.get(identityId) !== resumeToken ||
          !isOpen(connection)
        ) {
          return rejected("NOT_AUTHENTICATED", MESSAGES.notAuthenticated);
        }
        this.bindAuthenticated(identityId, connection);
        sendText(connection, formatOutboundFrame({ tag: "GAME LIST" }));
        return accepted();
      }
    );
    if (outcome.ok) {
      logCoordinator(this.logger, { tag: "session:reconnect", identityId });
    }
    return outcome;
  }

  /**
   * Drops the identity's registration and reconciles its lobby. A connection
   * that was already superseded leaves the newer one untouched.
   */
  async disconnectIdentity(
    identityId: IdentityId,
    connection: Connection
  ): Promise<CommandResult> {
    this.connectionMeta.delete(connection);
    const result = await this.dispatch(
      { type: "disconnect", identityId },
      {
        guard: () =>
          this.authenticated.get(identityId) === connection
            ? null
            : rejected("NOT_AUTHENTICATED", MESSAGES.notAuthenticated),
        onCommit: () => {
          this.authenticated.disconnect(identityId, connection);
          this.resumeTokens.delete(identityId);
          this.pairing.cancelSignInExpiry(identityId);
        },
      }
    );
    if (result.ok) {
      logCoordinator(this.logger, { tag: "session:disconnect", identityId });
    }
    return result;
  }

  async logout(identityId: IdentityId, connection: Connection) {
    const result = await this.disconnectIdentity(identityId, connection);
    connection.close(LOGOUT_CLOSE_CODE, "logout");
    return result;
  }

  /** Transport closed or errored. Safe to call more than once. */
  async handleConnectionClosed(connection: Connection): Promise<void> {
    const meta = this.connectionMeta.get(connection);
    if (!meta) return;
    if (meta.kind === "anonymous") {
      this.connectionMeta.delete(connection);
      this.pairing.release(meta.pairingId, connection);
      return;
    }
    await this.disconnectIdentity(meta.identityId, connection);
  }

  async stop(): Promise<void> {
    this.pairing.stop();
    await this.queue.drain();
  }
}
