// packages/lobby/src/frames.ts

export type InboundFrame =
  | { tag: "LOGOUT" }
  | { tag: "GAME LIST"; roms: string[] }
  | { tag: "SERVER IP"; address: string }
  | { tag: "PLAYER NUMBER"; value: number }
  | { tag: "FRAME DELAY"; value: number }
  | { tag: "USER PING"; value: number }
  | { tag: "START AUTH" };

export type InboundTag = InboundFrame["tag"];

export type TelemetryTag = Extract<
  InboundTag,
  "PLAYER NUMBER" | "FRAME DELAY" | "USER PING"
>;

export type OutboundFrame =
  | { tag: "AUTH URL"; url: string }
  | { tag: "AUTH ID"; code: string }
  | { tag: "USER ID"; identityId: string }
  | { tag: "AUTH SUCCESS" }
  | { tag: "RESUME TOKEN"; token: string }
  | { tag: "GAME LIST" }
  | { tag: "CREATE GAME"; romName: string }
  | { tag: "JOIN GAME"; address: string }
  | { tag: "ROM NAME"; romName: string }
  | { tag: "LEAVE GAME" }
  | { tag: "START GAME" }
  | { tag: "DROP GAME"; username: string };

export type InboundParseResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; reason: "unknown_tag" }
  | { ok: false; reason: "malformed"; tag: InboundTag; message: string };

// Matched in order; no tag is a prefix of another.
const INBOUND_TAGS: readonly InboundTag[] = [
  "LOGOUT",
  "GAME LIST",
  "SERVER IP",
  "PLAYER NUMBER",
  "FRAME DELAY",
  "USER PING",
  "START AUTH",
];

const INTEGER_PATTERN = /^-?\d+$/;

function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

function parseTelemetry(
  tag: TelemetryTag,
  payload: string
): InboundParseResult {
  const value = parseInteger(payload);
  if (value === null) {
    return {
      ok: false,
      reason: "malformed",
      tag,
      message: `${tag} expects an integer, got "${payload}"`,
    };
  }
  return { ok: true, frame: { tag, value } };
}

export function splitCatalog(payload: string): string[] {
  return payload
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parseInboundFrame(raw: string): InboundParseResult {
  const text = raw.replace(/\r?\n$/, "");
  const tag = INBOUND_TAGS.find((candidate) => text.startsWith(candidate));
  if (!tag) return { ok: false, reason: "unknown_tag" };

  const payload = text.slice(tag.length);
  switch (tag) {
    case "LOGOUT":
      return { ok: true, frame: { tag } };
    case "START AUTH":
      return { ok: true, frame: { tag } };
    case "GAME LIST":
      return { ok: true, frame: { tag, roms: splitCatalog(payload) } };
    case "SERVER IP": {
      const address = payload.trim();
      if (!address) {
        return {
          ok: false,
          reason: "malformed",
          tag,
          message: "SERVER IP requires an address",
        };
      }
      return { ok: true, frame: { tag, address } };
    }
    case "PLAYER NUMBER":
    case "FRAME DELAY":
    case "USER PING":
      return parseTelemetry(tag, payload);
  }
}

export function formatOutboundFrame(frame: OutboundFrame): string {
  switch (frame.tag) {
    case "AUTH URL":
      return `${frame.tag}${frame.url}`;
    case "AUTH ID":
      return `${frame.tag}${frame.code}`;
    case "USER ID":
      return `${frame.tag}${frame.identityId}`;
    case "RESUME TOKEN":
      return `${frame.tag}${frame.token}`;
    case "CREATE GAME":
    case "ROM NAME":
      return `${frame.tag}${frame.romName}`;
    case "JOIN GAME":
      return `${frame.tag}${frame.address}`;
    case "DROP GAME":
      return `${frame.tag}${frame.username}`;
    case "AUTH SUCCESS":
    case "GAME LIST":
    case "LEAVE GAME":
    case "START GAME":
      return frame.tag;
  }
}
