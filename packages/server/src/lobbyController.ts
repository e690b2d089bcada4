// packages/server/src/lobbyController.ts

import type { CoordinatorAction, IdentityId } from "@netplay/lobby";
import type { CommandResult } from "./commandResult";
import type { Coordinator } from "./coordinator";
import { logCoordinator } from "./logger";

type LobbyAction = Extract<
  CoordinatorAction,
  { type: "createLobby" | "joinLobby" | "leaveLobby" | "startLobby" | "dropLobby" }
>;

const TAG_BY_ACTION: Record<LobbyAction["type"], string> = {
  createLobby: "lobby:create",
  joinLobby: "lobby:join",
  leaveLobby: "lobby:leave",
  startLobby: "lobby:start",
  dropLobby: "lobby:drop",
};

/** The create/join/leave/start/drop command surface. */
export class LobbyController {
  constructor(private readonly coordinator: Coordinator) {}

  create(identityId: IdentityId, romName: string) {
    return this.run({ type: "createLobby", identityId, romName });
  }

  join(identityId: IdentityId, targetId: IdentityId) {
    return this.run({ type: "joinLobby", identityId, targetId });
  }

  leave(identityId: IdentityId) {
    return this.run({ type: "leaveLobby", identityId });
  }

  start(identityId: IdentityId) {
    return this.run({ type: "startLobby", identityId });
  }

  drop(identityId: IdentityId) {
    return this.run({ type: "dropLobby", identityId });
  }

  private async run(action: LobbyAction): Promise<CommandResult> {
    const result = await this.coordinator.dispatch(action);
    const tag = TAG_BY_ACTION[action.type];
    logCoordinator(
      this.coordinator.logger,
      result.ok
        ? { tag, identityId: action.identityId }
        : {
            tag: "lobby:rejected",
            command: tag,
            identityId: action.identityId,
            code: result.code,
          }
    );
    return result;
  }
}
