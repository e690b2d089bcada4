// packages/lobby/src/tests/fixtures.ts

import { applyAction } from "../actions/registry";
import {
  createEmptyState,
  type CoordinatorAction,
  type CoordinatorState,
  type Effect,
  type IdentityProfile,
} from "../model";

export const NOW = 1_700_000_000_000;

export function profile(id: string, username = `user${id}`): IdentityProfile {
  return { id, username };
}

export function mustApply(
  state: CoordinatorState,
  action: CoordinatorAction,
  now = NOW
): { state: CoordinatorState; effects: Effect[] } {
  const result = applyAction(state, action, now);
  if (!result.ok) {
    throw new Error(`expected ${action.type} to apply, got ${result.code}`);
  }
  return { state: result.state, effects: result.effects };
}

export function rejectionCode(
  state: CoordinatorState,
  action: CoordinatorAction
): string {
  const result = applyAction(state, action, NOW);
  if (result.ok) {
    throw new Error(`expected ${action.type} to be rejected`);
  }
  return result.code;
}

/** Signs in, authenticates and reports a catalog for each id. */
export function withPlayers(
  players: Array<{ id: string; roms: string[]; username?: string }>,
  state: CoordinatorState = createEmptyState()
): CoordinatorState {
  let next = state;
  for (const player of players) {
    next = mustApply(next, {
      type: "signIn",
      profile: profile(player.id, player.username),
    }).state;
    next = mustApply(next, { type: "authenticate", identityId: player.id }).state;
    next = mustApply(next, {
      type: "telemetry",
      identityId: player.id,
      frame: { tag: "GAME LIST", roms: player.roms },
    }).state;
  }
  return next;
}

export function framesTo(effects: Effect[], identityId: string): string[] {
  return effects.flatMap((effect) =>
    effect.kind === "frame" && effect.to === identityId ? [effect.frame.tag] : []
  );
}

export function noticeTypes(effects: Effect[]): string[] {
  return effects.flatMap((effect) =>
    effect.kind === "notice" ? [effect.notice.type] : []
  );
}
