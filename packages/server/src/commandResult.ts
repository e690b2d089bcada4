// packages/server/src/commandResult.ts

import type { LobbyRejectionCode } from "@netplay/lobby";

export type CommandRejectedCode =
  | LobbyRejectionCode
  | "BAD_REQUEST"
  | "INVALID_CODE"
  | "UNKNOWN_PAIRING_CODE";

export interface CommandAccepted<T = undefined> {
  ok: true;
  data: T;
}

export interface CommandRejected {
  ok: false;
  code: CommandRejectedCode;
  message: string;
}

export type CommandResult<T = undefined> = CommandAccepted<T> | CommandRejected;

export function accepted(): CommandAccepted;
export function accepted<T>(data: T): CommandAccepted<T>;
export function accepted<T>(data?: T): CommandAccepted<T | undefined> {
  return { ok: true, data };
}

export function rejected(
  code: CommandRejectedCode,
  message: string
): CommandRejected {
  return { ok: false, code, message };
}

const STATUS_BY_CODE: Partial<Record<CommandRejectedCode, number>> = {
  BAD_REQUEST: 400,
  INVALID_CODE: 400,
  MALFORMED_TELEMETRY: 400,
  NOT_SIGNED_IN: 401,
  NOT_AUTHENTICATED: 401,
  NOT_OWNER: 403,
  LOBBY_NOT_FOUND: 404,
  UNKNOWN_PAIRING_CODE: 404,
};

export function httpStatusFor(code: CommandRejectedCode): number {
  return STATUS_BY_CODE[code] ?? 409;
}
