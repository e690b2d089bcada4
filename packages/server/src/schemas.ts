// packages/server/src/schemas.ts

import { z } from "zod";
import type { IdentityProfile } from "@netplay/lobby";

export const IdentityIdSchema = z
  .string()
  .regex(/^(0|[1-9]\d{0,19})$/, "identity ids are decimal snowflakes");

/** User object as the chat platform's OAuth `users/@me` endpoint returns it. */
export const SignInBodySchema = z
  .object({
    id: IdentityIdSchema,
    username: z.string().min(1).max(64),
    discriminator: z.string().optional(),
    avatar: z.string().nullable().optional(),
    locale: z.string().optional(),
    mfa_enabled: z.boolean().optional(),
    flags: z.number().int().optional(),
    premium_type: z.number().int().optional(),
    public_flags: z.number().int().optional(),
    banner: z.string().nullable().optional(),
    banner_color: z.string().nullable().optional(),
    accent_color: z.number().int().nullable().optional(),
    email: z.string().nullable().optional(),
  })
  .transform(
    (user): IdentityProfile => ({
      id: user.id,
      username: user.username,
      discriminator: user.discriminator,
      avatar: user.avatar,
      locale: user.locale,
      mfaEnabled: user.mfa_enabled,
      flags: user.flags,
      premiumType: user.premium_type,
      publicFlags: user.public_flags,
      banner: user.banner,
      bannerColor: user.banner_color,
      accentColor: user.accent_color,
      email: user.email,
    })
  );

export const IdentityCommandBodySchema = z.object({
  identityId: IdentityIdSchema,
});

export const ConfirmPairingBodySchema = IdentityCommandBodySchema.extend({
  code: z.string().max(64),
});

export const CreateLobbyBodySchema = IdentityCommandBodySchema.extend({
  romName: z.string().max(256),
});

export const JoinLobbyBodySchema = IdentityCommandBodySchema.extend({
  targetId: IdentityIdSchema,
});

export const LobbyParamsSchema = z.object({ id: IdentityIdSchema });

export const ReconnectParamsSchema = z.object({ identityId: IdentityIdSchema });

export const ReconnectQuerySchema = z.object({
  token: z.string().min(1).max(64),
});
