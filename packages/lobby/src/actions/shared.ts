// packages/lobby/src/actions/shared.ts

import type {
  ApplyResult,
  CoordinatorState,
  Effect,
  IdentityId,
  IdentitySession,
  Lobby,
  LobbyId,
  LobbyRejectionCode,
  RosterEntry,
} from "../model";
import type { OutboundFrame } from "../frames";

export const MESSAGES = {
  notAuthenticated: "You must be authenticated to use this command!",
  alreadyAuthenticated: "You are already authenticated!",
  alreadyInLobby: "You are already in a game!",
  invalidRom: "Please enter a valid ROM name!",
  romNotOwned: "You do not have this ROM",
  lobbyNotFound: "This game does not exist!",
  lobbyNotIdle: "This game has already started!",
  lobbyFull: "This game is full!",
  noLobbyToLeave: "You don't have a game to leave!",
  noLobbyToStart: "You don't have a game to start!",
  noLobbyToDrop: "You don't have a game to drop!",
  noLobbyForAddress: "You must be in a game to announce a server address",
  notOwner: "You are not the owner of this game!",
  alreadyPlaying: "This game is already running!",
  notPlaying: "This game is not running!",
} as const;

export function reject(code: LobbyRejectionCode, message: string): ApplyResult {
  return { ok: false, code, message };
}

export function accept(state: CoordinatorState, effects: Effect[]): ApplyResult {
  return { ok: true, state, effects };
}

export function frame(to: IdentityId, outbound: OutboundFrame): Effect {
  return { kind: "frame", to, frame: outbound };
}

export function withIdentity(
  state: CoordinatorState,
  identity: IdentitySession
): CoordinatorState {
  return {
    ...state,
    identities: { ...state.identities, [identity.id]: identity },
  };
}

export function withoutIdentity(
  state: CoordinatorState,
  identityId: IdentityId
): CoordinatorState {
  const { [identityId]: _removed, ...identities } = state.identities;
  return { ...state, identities };
}

export function withLobby(state: CoordinatorState, lobby: Lobby): CoordinatorState {
  return {
    ...state,
    lobbies: { ...state.lobbies, [lobby.id]: lobby },
  };
}

export function withoutLobby(
  state: CoordinatorState,
  lobbyId: LobbyId
): CoordinatorState {
  const { [lobbyId]: _removed, ...lobbies } = state.lobbies;
  return { ...state, lobbies };
}

export function setLobbyId(
  state: CoordinatorState,
  identityId: IdentityId,
  lobbyId: LobbyId | null
): CoordinatorState {
  const identity = state.identities[identityId];
  if (!identity) return state;
  return withIdentity(state, { ...identity, lobbyId });
}

export type Lookup<T> =
  | { ok: true; value: T }
  | { ok: false; result: ApplyResult };

export function requireAuthenticated(
  state: CoordinatorState,
  identityId: IdentityId
): Lookup<IdentitySession> {
  const identity = state.identities[identityId];
  if (!identity || identity.authState !== "AUTHENTICATED") {
    return {
      ok: false,
      result: reject("NOT_AUTHENTICATED", MESSAGES.notAuthenticated),
    };
  }
  return { ok: true, value: identity };
}

export function buildRoster(
  state: CoordinatorState,
  lobby: Lobby
): RosterEntry[] {
  return lobby.roster.flatMap((memberId) => {
    const member = state.identities[memberId];
    if (!member) return [];
    return [
      {
        identityId: member.id,
        displayName: member.displayName,
        ping: member.ping,
        frameDelay: member.frameDelay,
        playerSlot: member.playerSlot,
      },
    ];
  });
}

export function isTelemetryComplete(
  state: CoordinatorState,
  lobby: Lobby
): boolean {
  return lobby.roster.every((memberId) => {
    const member = state.identities[memberId];
    return !!member && member.ping !== null && member.frameDelay !== null;
  });
}

/**
 * Publishes the lobby's telemetry summary when every member has reported.
 * `force` republishes even if the current roster was already announced.
 */
export function publishRosterIfReady(
  state: CoordinatorState,
  lobbyId: LobbyId,
  force = false
): { state: CoordinatorState; effects: Effect[] } {
  const lobby = state.lobbies[lobbyId];
  if (!lobby) return { state, effects: [] };
  if (lobby.summaryPublished && !force) return { state, effects: [] };
  if (!isTelemetryComplete(state, lobby)) return { state, effects: [] };

  return {
    state: withLobby(state, { ...lobby, summaryPublished: true }),
    effects: [
      {
        kind: "notice",
        notice: {
          type: "rosterReady",
          lobbyId: lobby.id,
          roster: buildRoster(state, lobby),
        },
      },
    ],
  };
}
