// packages/lobby/src/view.ts

import type {
  CoordinatorState,
  IdentityId,
  LobbyId,
  LobbyState,
  RosterEntry,
} from "./model";
import { isJoinable } from "./model";
import { buildRoster, isTelemetryComplete } from "./actions/shared";

export interface LobbySummary {
  id: LobbyId;
  ownerId: IdentityId;
  ownerName: string;
  romName: string;
  state: LobbyState;
  capacity: number;
  joinable: boolean;
  hasRelayAddress: boolean;
  telemetryComplete: boolean;
  roster: RosterEntry[];
  createdAt: number;
}

export function makeLobbySummary(
  state: CoordinatorState,
  lobbyId: LobbyId
): LobbySummary | null {
  const lobby = state.lobbies[lobbyId];
  if (!lobby) return null;
  const owner = state.identities[lobby.ownerId];
  return {
    id: lobby.id,
    ownerId: lobby.ownerId,
    ownerName: owner ? owner.displayName : lobby.ownerId,
    romName: lobby.romName,
    state: lobby.state,
    capacity: lobby.capacity,
    joinable: lobby.state === "IDLE" && isJoinable(lobby),
    hasRelayAddress: lobby.relayAddress !== null,
    telemetryComplete: isTelemetryComplete(state, lobby),
    roster: buildRoster(state, lobby),
    createdAt: lobby.createdAt,
  };
}

export function listLobbySummaries(state: CoordinatorState): LobbySummary[] {
  return Object.keys(state.lobbies)
    .map((lobbyId) => makeLobbySummary(state, lobbyId))
    .filter((summary): summary is LobbySummary => summary !== null)
    .sort((a, b) => a.createdAt - b.createdAt);
}

/**
 * Cross-reference check between identities and lobbies. Returns a list of
 * human readable violations; empty when the tables agree.
 */
export function findInvariantViolations(state: CoordinatorState): string[] {
  const violations: string[] = [];

  for (const lobby of Object.values(state.lobbies)) {
    if (lobby.roster.length > lobby.capacity) {
      violations.push(`lobby ${lobby.id} exceeds capacity`);
    }
    if (!lobby.roster.includes(lobby.ownerId)) {
      violations.push(`lobby ${lobby.id} roster lacks its owner`);
    }
    if (new Set(lobby.roster).size !== lobby.roster.length) {
      violations.push(`lobby ${lobby.id} lists a member twice`);
    }
    for (const memberId of lobby.roster) {
      const member = state.identities[memberId];
      if (!member) {
        violations.push(`lobby ${lobby.id} lists unknown identity ${memberId}`);
      } else if (member.lobbyId !== lobby.id) {
        violations.push(`identity ${memberId} does not point back to ${lobby.id}`);
      }
    }
  }

  for (const identity of Object.values(state.identities)) {
    if (identity.lobbyId === null) continue;
    const lobby = state.lobbies[identity.lobbyId];
    if (!lobby || !lobby.roster.includes(identity.id)) {
      violations.push(`identity ${identity.id} points at a lobby without it`);
    }
  }

  return violations;
}
