// packages/lobby/src/actions/lobbyActions.ts

import type {
  ApplyResult,
  CoordinatorAction,
  CoordinatorState,
  Effect,
  IdentityId,
  Lobby,
} from "../model";
import { LOBBY_CAPACITY, currentLobbyOf, isJoinable } from "../model";
import {
  MESSAGES,
  accept,
  frame,
  publishRosterIfReady,
  reject,
  requireAuthenticated,
  setLobbyId,
  withLobby,
  withoutLobby,
} from "./shared";

type ActionOf<T extends CoordinatorAction["type"]> = Extract<
  CoordinatorAction,
  { type: T }
>;

function applyCreateLobby(
  state: CoordinatorState,
  action: ActionOf<"createLobby">,
  now: number
): ApplyResult {
  const lookup = requireAuthenticated(state, action.identityId);
  if (!lookup.ok) return lookup.result;
  const owner = lookup.value;

  if (owner.lobbyId !== null) {
    return reject("ALREADY_IN_LOBBY", MESSAGES.alreadyInLobby);
  }
  const romName = action.romName.trim();
  if (!romName || !owner.contentCatalog.includes(romName)) {
    return reject("ROM_NOT_OWNED", MESSAGES.invalidRom);
  }

  const lobby: Lobby = {
    id: owner.id,
    ownerId: owner.id,
    roster: [owner.id],
    romName,
    relayAddress: null,
    state: "IDLE",
    capacity: LOBBY_CAPACITY,
    summaryPublished: false,
    createdAt: now,
  };

  let next = withLobby(state, lobby);
  next = setLobbyId(next, owner.id, lobby.id);
  // telemetry may have been reported before the lobby existed
  const summary = publishRosterIfReady(next, lobby.id);

  return accept(summary.state, [
    frame(owner.id, { tag: "CREATE GAME", romName }),
    {
      kind: "notice",
      notice: {
        type: "lobbyCreated",
        lobbyId: lobby.id,
        ownerId: owner.id,
        romName,
        capacity: lobby.capacity,
      },
    },
    ...summary.effects,
  ]);
}

function applyJoinLobby(
  state: CoordinatorState,
  action: ActionOf<"joinLobby">
): ApplyResult {
  const lookup = requireAuthenticated(state, action.identityId);
  if (!lookup.ok) return lookup.result;
  const joiner = lookup.value;

  if (joiner.lobbyId !== null) {
    return reject("ALREADY_IN_LOBBY", MESSAGES.alreadyInLobby);
  }

  const target = state.identities[action.targetId];
  const lobby =
    target && target.lobbyId === target.id ? state.lobbies[target.id] : undefined;
  if (!lobby) {
    return reject("LOBBY_NOT_FOUND", MESSAGES.lobbyNotFound);
  }
  // owner/state first, then capacity, then content
  if (lobby.state !== "IDLE") {
    return reject("LOBBY_NOT_IDLE", MESSAGES.lobbyNotIdle);
  }
  if (!isJoinable(lobby)) {
    return reject("LOBBY_FULL", MESSAGES.lobbyFull);
  }
  if (!joiner.contentCatalog.includes(lobby.romName)) {
    return reject("ROM_NOT_OWNED", MESSAGES.romNotOwned);
  }

  const updated: Lobby = {
    ...lobby,
    roster: [...lobby.roster, joiner.id],
    summaryPublished: false,
  };
  let next = withLobby(state, updated);
  next = setLobbyId(next, joiner.id, updated.id);
  const summary = publishRosterIfReady(next, updated.id);

  return accept(summary.state, [
    frame(joiner.id, { tag: "JOIN GAME", address: updated.relayAddress ?? "" }),
    frame(joiner.id, { tag: "ROM NAME", romName: updated.romName }),
    {
      kind: "notice",
      notice: {
        type: "memberJoined",
        lobbyId: updated.id,
        identityId: joiner.id,
        rosterSize: updated.roster.length,
        joinable: isJoinable(updated),
      },
    },
    ...summary.effects,
  ]);
}

/**
 * Removes an identity from its lobby. An owner tears the lobby down for
 * everybody; a member only removes itself. The leaver's own `lobbyId` is
 * cleared last.
 */
export function detachFromLobby(
  state: CoordinatorState,
  identityId: IdentityId,
  notifySelf: boolean
): { state: CoordinatorState; effects: Effect[] } {
  const identity = state.identities[identityId];
  if (!identity || identity.lobbyId === null) return { state, effects: [] };

  const lobby = state.lobbies[identity.lobbyId];
  if (!lobby) {
    return { state: setLobbyId(state, identityId, null), effects: [] };
  }

  const effects: Effect[] = [];
  if (notifySelf) {
    effects.push(frame(identityId, { tag: "LEAVE GAME" }));
  }

  let next = state;
  if (lobby.ownerId === identityId) {
    const others = lobby.roster.filter((memberId) => memberId !== identityId);
    for (const memberId of others) {
      next = setLobbyId(next, memberId, null);
      effects.push(frame(memberId, { tag: "LEAVE GAME" }));
    }
    next = withoutLobby(next, lobby.id);
    effects.push({
      kind: "notice",
      notice: { type: "lobbyClosed", lobbyId: lobby.id, memberIds: others },
    });
  } else {
    const updated: Lobby = {
      ...lobby,
      roster: lobby.roster.filter((memberId) => memberId !== identityId),
      summaryPublished: false,
    };
    next = withLobby(next, updated);
    effects.push({
      kind: "notice",
      notice: {
        type: "memberLeft",
        lobbyId: updated.id,
        identityId,
        rosterSize: updated.roster.length,
        joinable: isJoinable(updated),
      },
    });
  }

  next = setLobbyId(next, identityId, null);
  return { state: next, effects };
}

function applyLeaveLobby(
  state: CoordinatorState,
  action: ActionOf<"leaveLobby">
): ApplyResult {
  const lookup = requireAuthenticated(state, action.identityId);
  if (!lookup.ok) return lookup.result;
  if (lookup.value.lobbyId === null) {
    return reject("NO_LOBBY", MESSAGES.noLobbyToLeave);
  }

  const detached = detachFromLobby(state, action.identityId, true);
  return accept(detached.state, detached.effects);
}

function requireOwnedLobby(
  state: CoordinatorState,
  identityId: IdentityId,
  noLobbyMessage: string
): { ok: true; lobby: Lobby } | { ok: false; result: ApplyResult } {
  const lookup = requireAuthenticated(state, identityId);
  if (!lookup.ok) return lookup;
  const identity = lookup.value;

  const lobby = currentLobbyOf(state, identity.id);
  if (!lobby) {
    return { ok: false, result: reject("NO_LOBBY", noLobbyMessage) };
  }
  if (lobby.ownerId !== identity.id) {
    return { ok: false, result: reject("NOT_OWNER", MESSAGES.notOwner) };
  }
  return { ok: true, lobby };
}

function applyStartLobby(
  state: CoordinatorState,
  action: ActionOf<"startLobby">
): ApplyResult {
  const owned = requireOwnedLobby(state, action.identityId, MESSAGES.noLobbyToStart);
  if (!owned.ok) return owned.result;
  const { lobby } = owned;

  if (lobby.state === "PLAYING") {
    return reject("LOBBY_ALREADY_PLAYING", MESSAGES.alreadyPlaying);
  }

  const started = withLobby(state, { ...lobby, state: "PLAYING" });
  const summary = publishRosterIfReady(started, lobby.id, true);

  return accept(summary.state, [
    frame(lobby.ownerId, { tag: "START GAME" }),
    { kind: "notice", notice: { type: "lobbyStarted", lobbyId: lobby.id } },
    ...summary.effects,
  ]);
}

function applyDropLobby(
  state: CoordinatorState,
  action: ActionOf<"dropLobby">
): ApplyResult {
  const owned = requireOwnedLobby(state, action.identityId, MESSAGES.noLobbyToDrop);
  if (!owned.ok) return owned.result;
  const { lobby } = owned;

  if (lobby.state !== "PLAYING") {
    return reject("LOBBY_NOT_PLAYING", MESSAGES.notPlaying);
  }

  const owner = state.identities[lobby.ownerId];
  const username = owner ? owner.displayName : lobby.ownerId;
  const next = withLobby(state, { ...lobby, state: "IDLE" });

  return accept(next, [
    ...lobby.roster.map((memberId) =>
      frame(memberId, { tag: "DROP GAME", username })
    ),
    { kind: "notice", notice: { type: "lobbyDropped", lobbyId: lobby.id } },
  ]);
}

export const lobbyHandlers = {
  applyCreateLobby,
  applyJoinLobby,
  applyLeaveLobby,
  applyStartLobby,
  applyDropLobby,
};
