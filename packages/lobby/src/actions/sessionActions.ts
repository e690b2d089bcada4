// packages/lobby/src/actions/sessionActions.ts

import type {
  ApplyResult,
  CoordinatorAction,
  CoordinatorState,
} from "../model";
import { createIdentitySession } from "../model";
import { detachFromLobby } from "./lobbyActions";
import {
  MESSAGES,
  accept,
  frame,
  reject,
  withIdentity,
  withoutIdentity,
} from "./shared";

type ActionOf<T extends CoordinatorAction["type"]> = Extract<
  CoordinatorAction,
  { type: T }
>;

function applySignIn(
  state: CoordinatorState,
  action: ActionOf<"signIn">,
  now: number
): ApplyResult {
  const existing = state.identities[action.profile.id];
  if (existing && existing.authState === "AUTHENTICATED") {
    return reject("ALREADY_AUTHENTICATED", MESSAGES.alreadyAuthenticated);
  }

  const identity = createIdentitySession(action.profile, now);
  return accept(withIdentity(state, identity), [
    {
      kind: "notice",
      notice: { type: "pairingRequested", identityId: identity.id },
    },
  ]);
}

function applyExpireSignIn(
  state: CoordinatorState,
  action: ActionOf<"expireSignIn">
): ApplyResult {
  const identity = state.identities[action.identityId];
  const stillPending =
    !!identity &&
    identity.authState === "UNAUTHENTICATED" &&
    identity.signedInAt === action.signedInAt;
  if (!stillPending) return accept(state, []);
  return accept(withoutIdentity(state, action.identityId), []);
}

function applyAuthenticate(
  state: CoordinatorState,
  action: ActionOf<"authenticate">
): ApplyResult {
  const identity = state.identities[action.identityId];
  if (!identity) {
    return reject("NOT_SIGNED_IN", MESSAGES.notAuthenticated);
  }
  if (identity.authState === "AUTHENTICATED") {
    return reject("ALREADY_AUTHENTICATED", MESSAGES.alreadyAuthenticated);
  }

  const next = withIdentity(state, { ...identity, authState: "AUTHENTICATED" });
  return accept(next, [
    frame(identity.id, { tag: "USER ID", identityId: identity.id }),
    frame(identity.id, { tag: "AUTH SUCCESS" }),
    frame(identity.id, { tag: "GAME LIST" }),
  ]);
}

/** Transport loss or logout. Missing identities are a no-op. */
function applyDisconnect(
  state: CoordinatorState,
  action: ActionOf<"disconnect">
): ApplyResult {
  if (!state.identities[action.identityId]) return accept(state, []);

  const detached = detachFromLobby(state, action.identityId, false);
  return accept(
    withoutIdentity(detached.state, action.identityId),
    detached.effects
  );
}

export const sessionHandlers = {
  applySignIn,
  applyExpireSignIn,
  applyAuthenticate,
  applyDisconnect,
};
