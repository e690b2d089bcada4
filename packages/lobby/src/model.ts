// packages/lobby/src/model.ts

import type { InboundFrame, OutboundFrame } from "./frames";

/** Platform snowflake, kept as a decimal string. */
export type IdentityId = string;

/** A lobby is keyed by its owner's identity id. */
export type LobbyId = IdentityId;

export type AuthState = "UNAUTHENTICATED" | "AUTHENTICATED";

export type LobbyState = "IDLE" | "PLAYING";

export const LOBBY_CAPACITY = 4;

export interface IdentityProfile {
  id: IdentityId;
  username: string;
  discriminator?: string;
  avatar?: string | null;
  locale?: string;
  mfaEnabled?: boolean;
  flags?: number;
  premiumType?: number;
  publicFlags?: number;
  banner?: string | null;
  bannerColor?: string | null;
  accentColor?: number | null;
  email?: string | null;
}

export interface IdentitySession {
  id: IdentityId;
  displayName: string;
  profile: IdentityProfile;
  authState: AuthState;
  contentCatalog: string[];
  lobbyId: LobbyId | null;
  ping: number | null;
  frameDelay: number | null;
  playerSlot: number | null;
  signedInAt: number;
}

export interface Lobby {
  id: LobbyId;
  ownerId: IdentityId;
  /** Owner first, then members in join order. */
  roster: IdentityId[];
  romName: string;
  relayAddress: string | null;
  state: LobbyState;
  capacity: number;
  /** Set once a complete telemetry summary went out for the current roster. */
  summaryPublished: boolean;
  createdAt: number;
}

export interface CoordinatorState {
  identities: Record<IdentityId, IdentitySession>;
  lobbies: Record<LobbyId, Lobby>;
}

export type LobbyRejectionCode =
  | "NOT_SIGNED_IN"
  | "NOT_AUTHENTICATED"
  | "ALREADY_AUTHENTICATED"
  | "ALREADY_IN_LOBBY"
  | "ROM_NOT_OWNED"
  | "LOBBY_NOT_FOUND"
  | "LOBBY_NOT_IDLE"
  | "LOBBY_FULL"
  | "NO_LOBBY"
  | "NOT_OWNER"
  | "LOBBY_ALREADY_PLAYING"
  | "LOBBY_NOT_PLAYING"
  | "MALFORMED_TELEMETRY";

export interface RosterEntry {
  identityId: IdentityId;
  displayName: string;
  ping: number | null;
  frameDelay: number | null;
  playerSlot: number | null;
}

export type PlatformNotice =
  | { type: "pairingRequested"; identityId: IdentityId }
  | {
      type: "lobbyCreated";
      lobbyId: LobbyId;
      ownerId: IdentityId;
      romName: string;
      capacity: number;
    }
  | {
      type: "memberJoined";
      lobbyId: LobbyId;
      identityId: IdentityId;
      rosterSize: number;
      joinable: boolean;
    }
  | {
      type: "memberLeft";
      lobbyId: LobbyId;
      identityId: IdentityId;
      rosterSize: number;
      joinable: boolean;
    }
  | { type: "lobbyClosed"; lobbyId: LobbyId; memberIds: IdentityId[] }
  | { type: "lobbyStarted"; lobbyId: LobbyId }
  | { type: "lobbyDropped"; lobbyId: LobbyId }
  | { type: "rosterReady"; lobbyId: LobbyId; roster: RosterEntry[] };

export type Effect =
  | { kind: "frame"; to: IdentityId; frame: OutboundFrame }
  | { kind: "notice"; notice: PlatformNotice };

export type ApplyResult =
  | { ok: true; state: CoordinatorState; effects: Effect[] }
  | {
      ok: false;
      code: LobbyRejectionCode;
      message: string;
    };

export function createEmptyState(): CoordinatorState {
  return { identities: {}, lobbies: {} };
}

export function createIdentitySession(
  profile: IdentityProfile,
  now: number
): IdentitySession {
  return {
    id: profile.id,
    displayName: profile.username,
    profile,
    authState: "UNAUTHENTICATED",
    contentCatalog: [],
    lobbyId: null,
    ping: null,
    frameDelay: null,
    playerSlot: null,
    signedInAt: now,
  };
}

export function isJoinable(lobby: Lobby): boolean {
  return lobby.roster.length < lobby.capacity;
}

export function currentLobbyOf(
  state: CoordinatorState,
  identityId: IdentityId
): Lobby | null {
  const identity = state.identities[identityId];
  if (!identity || identity.lobbyId === null) return null;
  return state.lobbies[identity.lobbyId] ?? null;
}

export type TelemetryFrame = Exclude<
  InboundFrame,
  { tag: "LOGOUT" } | { tag: "START AUTH" }
>;

export type CoordinatorAction =
  | { type: "signIn"; profile: IdentityProfile }
  | { type: "expireSignIn"; identityId: IdentityId; signedInAt: number }
  | { type: "authenticate"; identityId: IdentityId }
  | { type: "disconnect"; identityId: IdentityId }
  | { type: "createLobby"; identityId: IdentityId; romName: string }
  | { type: "joinLobby"; identityId: IdentityId; targetId: IdentityId }
  | { type: "leaveLobby"; identityId: IdentityId }
  | { type: "startLobby"; identityId: IdentityId }
  | { type: "dropLobby"; identityId: IdentityId }
  | { type: "telemetry"; identityId: IdentityId; frame: TelemetryFrame };
