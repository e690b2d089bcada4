// packages/lobby/src/actions/telemetryActions.ts

import type {
  ApplyResult,
  CoordinatorAction,
  CoordinatorState,
  Effect,
  IdentitySession,
  TelemetryFrame,
} from "../model";
import { currentLobbyOf } from "../model";
import {
  MESSAGES,
  accept,
  frame,
  publishRosterIfReady,
  reject,
  requireAuthenticated,
  withIdentity,
  withLobby,
} from "./shared";

type TelemetryAction = Extract<CoordinatorAction, { type: "telemetry" }>;

function applyServerAddress(
  state: CoordinatorState,
  identity: IdentitySession,
  address: string
): ApplyResult {
  const lobby = currentLobbyOf(state, identity.id);
  if (!lobby) {
    return reject("NO_LOBBY", MESSAGES.noLobbyForAddress);
  }

  const next = withLobby(state, { ...lobby, relayAddress: address });
  // members that joined before the address was known get it now
  const effects: Effect[] = lobby.roster
    .filter((memberId) => memberId !== identity.id)
    .map((memberId) => frame(memberId, { tag: "JOIN GAME", address }));
  return accept(next, effects);
}

function applyFrame(
  state: CoordinatorState,
  identity: IdentitySession,
  telemetry: TelemetryFrame
): ApplyResult {
  switch (telemetry.tag) {
    case "GAME LIST":
      return accept(
        withIdentity(state, { ...identity, contentCatalog: telemetry.roms }),
        []
      );
    case "SERVER IP":
      return applyServerAddress(state, identity, telemetry.address);
    case "PLAYER NUMBER":
      return accept(
        withIdentity(state, { ...identity, playerSlot: telemetry.value }),
        []
      );
    case "FRAME DELAY":
      return accept(
        withIdentity(state, { ...identity, frameDelay: telemetry.value }),
        []
      );
    case "USER PING":
      return accept(withIdentity(state, { ...identity, ping: telemetry.value }), []);
  }
}

export function applyTelemetry(
  state: CoordinatorState,
  action: TelemetryAction
): ApplyResult {
  const lookup = requireAuthenticated(state, action.identityId);
  if (!lookup.ok) return lookup.result;
  const identity = lookup.value;

  const applied = applyFrame(state, identity, action.frame);
  if (!applied.ok || identity.lobbyId === null) return applied;

  const summary = publishRosterIfReady(applied.state, identity.lobbyId);
  return accept(summary.state, [...applied.effects, ...summary.effects]);
}
