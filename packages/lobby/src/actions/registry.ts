// packages/lobby/src/actions/registry.ts

import type { ApplyResult, CoordinatorAction, CoordinatorState } from "../model";
import { lobbyHandlers } from "./lobbyActions";
import { sessionHandlers } from "./sessionActions";
import { applyTelemetry } from "./telemetryActions";

export function applyAction(
  state: CoordinatorState,
  action: CoordinatorAction,
  now: number = Date.now()
): ApplyResult {
  switch (action.type) {
    case "signIn":
      return sessionHandlers.applySignIn(state, action, now);
    case "expireSignIn":
      return sessionHandlers.applyExpireSignIn(state, action);
    case "authenticate":
      return sessionHandlers.applyAuthenticate(state, action);
    case "disconnect":
      return sessionHandlers.applyDisconnect(state, action);
    case "createLobby":
      return lobbyHandlers.applyCreateLobby(state, action, now);
    case "joinLobby":
      return lobbyHandlers.applyJoinLobby(state, action);
    case "leaveLobby":
      return lobbyHandlers.applyLeaveLobby(state, action);
    case "startLobby":
      return lobbyHandlers.applyStartLobby(state, action);
    case "dropLobby":
      return lobbyHandlers.applyDropLobby(state, action);
    case "telemetry":
      return applyTelemetry(state, action);
  }
}
