// packages/server/src/pairingCode.ts

import { createHmac, randomBytes } from "node:crypto";

export type PairingId = string;

const PAIRING_ID_BYTES = 16;
const CODE_PATTERN = /^[0-9a-f]{32}$/;

/** 128 random bits as lowercase hex. */
export function generatePairingId(): PairingId {
  return randomBytes(PAIRING_ID_BYTES).toString("hex");
}

function keystream(secret: string): Buffer {
  return createHmac("sha256", secret)
    .update("pairing-code")
    .digest()
    .subarray(0, PAIRING_ID_BYTES);
}

function xorWith(bytes: Buffer, key: Buffer): Buffer {
  const out = Buffer.alloc(bytes.length);
  for (let i = 0; i < bytes.length; i += 1) {
    out[i] = bytes[i] ^ key[i];
  }
  return out;
}

/**
 * Display form of a pairing id: the id XOR-ed with a secret-derived key,
 * uppercase hex in dash-separated groups of four.
 */
export function encodePairingCode(pairingId: PairingId, secret: string): string {
  const masked = xorWith(Buffer.from(pairingId, "hex"), keystream(secret))
    .toString("hex")
    .toUpperCase();
  return masked.match(/.{4}/g)?.join("-") ?? masked;
}

/** Inverse of `encodePairingCode`; `null` when the code is malformed. */
export function decodePairingCode(code: string, secret: string): PairingId | null {
  const normalized = code.replace(/[\s-]/g, "").toLowerCase();
  if (!CODE_PATTERN.test(normalized)) return null;
  return xorWith(Buffer.from(normalized, "hex"), keystream(secret)).toString("hex");
}
