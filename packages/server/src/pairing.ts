// packages/server/src/pairing.ts

import {
  formatOutboundFrame,
  type IdentityId,
  type IdentityProfile,
} from "@netplay/lobby";
import { pairingQueueKey } from "./commandQueue";
import { rejected, type CommandResult } from "./commandResult";
import { buildAuthorizeUrl } from "./config";
import { isOpen, sendText, type Connection } from "./connectionRegistry";
import type { Coordinator } from "./coordinator";
import { logCoordinator } from "./logger";
import {
  decodePairingCode,
  encodePairingCode,
  generatePairingId,
  type PairingId,
} from "./pairingCode";

export const PAIRING_MESSAGES = {
  invalidCode: "Please enter a valid auth id",
  unknownCode:
    "User has not been authenticated yet or the time to authenticate has expired, try again",
} as const;

/**
 * Binds anonymous connections to identities confirmed on the chat platform.
 *
 * An anonymous connection gets a pairing id on open and waits in the
 * pre-auth registry until the identity submits the matching code or the
 * pairing timer drops it. Sign-ins that are never confirmed are discarded by
 * a second timer.
 */
export class AuthPairingCoordinator {
  private readonly pairingTimers = new Map<PairingId, NodeJS.Timeout>();
  private readonly signInTimers = new Map<IdentityId, NodeJS.Timeout>();

  constructor(private readonly coordinator: Coordinator) {}

  open(connection: Connection): PairingId {
    const pairingId = generatePairingId();
    this.coordinator.anonymous.connect(pairingId, connection);
    this.coordinator.setMeta(connection, { kind: "anonymous", pairingId });
    this.schedulePairingExpiry(pairingId, connection);
    logCoordinator(this.coordinator.logger, { tag: "pairing:open", pairingId });
    return pairingId;
  }

  codeFor(pairingId: PairingId): string {
    return encodePairingCode(pairingId, this.coordinator.config.pairing.secret);
  }

  /**
   * Answers `START AUTH`: sends the authorize URL and the pairing code. An
   * expired pairing is reissued under a fresh id first.
   */
  startAuth(connection: Connection): PairingId | null {
    const meta = this.coordinator.metaOf(connection);
    if (!meta || meta.kind !== "anonymous") return null;

    let pairingId = meta.pairingId;
    if (this.coordinator.anonymous.get(pairingId) !== connection) {
      pairingId = this.open(connection);
      logCoordinator(this.coordinator.logger, { tag: "pairing:reissued", pairingId });
    }

    const url = buildAuthorizeUrl(this.coordinator.config);
    sendText(connection, formatOutboundFrame({ tag: "AUTH URL", url }));
    sendText(
      connection,
      formatOutboundFrame({ tag: "AUTH ID", code: this.codeFor(pairingId) })
    );
    return pairingId;
  }

  /** Called straight from the transport close, outside the state queue. */
  release(pairingId: PairingId, connection: Connection) {
    if (!this.coordinator.anonymous.disconnect(pairingId, connection)) return;
    this.clearPairingTimer(pairingId);
    logCoordinator(this.coordinator.logger, { tag: "pairing:closed", pairingId });
  }

  async confirm(identityId: IdentityId, code: string): Promise<CommandResult> {
    const trimmed = code.trim();
    const pairingId = trimmed
      ? decodePairingCode(trimmed, this.coordinator.config.pairing.secret)
      : null;
    if (!pairingId) {
      return rejected("INVALID_CODE", PAIRING_MESSAGES.invalidCode);
    }

    const result = await this.coordinator.dispatch(
      { type: "authenticate", identityId },
      {
        guard: () => {
          const pending = this.coordinator.anonymous.get(pairingId);
          return pending && isOpen(pending)
            ? null
            : rejected("UNKNOWN_PAIRING_CODE", PAIRING_MESSAGES.unknownCode);
        },
        onCommit: () => {
          const connection = this.coordinator.anonymous.take(pairingId);
          this.clearPairingTimer(pairingId);
          this.cancelSignInExpiry(identityId);
          if (connection) {
            this.coordinator.bindAuthenticated(identityId, connection);
          }
        },
        afterFrames: () => {
          const connection = this.coordinator.authenticated.get(identityId);
          if (!connection) return;
          const token = this.coordinator.issueResumeToken(identityId);
          sendText(connection, formatOutboundFrame({ tag: "RESUME TOKEN", token }));
        },
      }
    );

    logCoordinator(
      this.coordinator.logger,
      result.ok
        ? { tag: "pairing:confirmed", identityId, pairingId }
        : { tag: "pairing:rejected", identityId, code: result.code }
    );
    return result;
  }

  /** Sign-in event from the OAuth callback: a pending, unconfirmed session. */
  async signIn(profile: IdentityProfile): Promise<CommandResult> {
    const result = await this.coordinator.dispatch(
      { type: "signIn", profile },
      {
        onCommit: (state) => {
          const identity = state.identities[profile.id];
          if (identity) this.scheduleSignInExpiry(identity.id, identity.signedInAt);
        },
      }
    );
    if (result.ok) {
      logCoordinator(this.coordinator.logger, {
        tag: "pairing:sign_in",
        identityId: profile.id,
      });
    }
    return result;
  }

  cancelSignInExpiry(identityId: IdentityId) {
    const timer = this.signInTimers.get(identityId);
    if (!timer) return;
    clearTimeout(timer);
    this.signInTimers.delete(identityId);
  }

  stop() {
    for (const timer of this.pairingTimers.values()) clearTimeout(timer);
    for (const timer of this.signInTimers.values()) clearTimeout(timer);
    this.pairingTimers.clear();
    this.signInTimers.clear();
  }

  pendingPairings(): number {
    return this.pairingTimers.size;
  }

  private clearPairingTimer(pairingId: PairingId) {
    const timer = this.pairingTimers.get(pairingId);
    if (!timer) return;
    clearTimeout(timer);
    this.pairingTimers.delete(pairingId);
  }

  private schedulePairingExpiry(pairingId: PairingId, connection: Connection) {
    const timer = setTimeout(() => {
      this.pairingTimers.delete(pairingId);
      void this.coordinator.queue
        .enqueue(pairingQueueKey(pairingId), () => {
          if (!this.coordinator.anonymous.disconnect(pairingId, connection)) return;
          logCoordinator(this.coordinator.logger, { tag: "pairing:expired", pairingId });
        })
        .catch((err) => {
          logCoordinator(this.coordinator.logger, {
            tag: "pairing:error",
            pairingId,
            code: "pairing_expiry_failed",
            message: String(err),
          });
        });
    }, this.coordinator.config.pairing.timeoutMs);
    timer.unref?.();
    this.pairingTimers.set(pairingId, timer);
  }

  private scheduleSignInExpiry(identityId: IdentityId, signedInAt: number) {
    this.cancelSignInExpiry(identityId);
    const timer = setTimeout(() => {
      this.signInTimers.delete(identityId);
      let wasPending = false;
      void this.coordinator
        .dispatch(
          { type: "expireSignIn", identityId, signedInAt },
          {
            guard: () => {
              const identity = this.coordinator.snapshot().identities[identityId];
              wasPending = !!identity && identity.authState === "UNAUTHENTICATED";
              return null;
            },
            onCommit: (state) => {
              if (!wasPending || state.identities[identityId]) return;
              logCoordinator(this.coordinator.logger, {
                tag: "pairing:sign_in_expired",
                identityId,
              });
            },
          }
        )
        .catch((err) => {
          logCoordinator(this.coordinator.logger, {
            tag: "pairing:error",
            identityId,
            code: "sign_in_expiry_failed",
            message: String(err),
          });
        });
    }, this.coordinator.config.pairing.signInTimeoutMs);
    timer.unref?.();
    this.signInTimers.set(identityId, timer);
  }
}
