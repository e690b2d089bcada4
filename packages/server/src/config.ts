// packages/server/src/config.ts

import { z } from "zod";

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: numberFromEnv(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  WEB_ORIGIN: z.string().url().optional(),
  OAUTH_CLIENT_ID: z.string().default(""),
  OAUTH_REDIRECT_URI: z.string().default("http://localhost:5000/callback"),
  OAUTH_AUTHORIZE_URL: z
    .string()
    .url()
    .default("https://discord.com/oauth2/authorize"),
  PAIRING_SECRET: z.string().min(1).default("dev_pairing_secret_change_me"),
  PAIRING_TIMEOUT_MS: numberFromEnv(120_000),
  SIGN_IN_TIMEOUT_MS: numberFromEnv(60_000),
  WS_MAX_PAYLOAD_BYTES: numberFromEnv(4 * 1024),
  WS_RATE_LIMIT_WINDOW_MS: numberFromEnv(1000),
  WS_RATE_LIMIT_MAX_MESSAGES: numberFromEnv(60),
  CHAT_WEBHOOK_URL: z.string().url().optional(),
});

export interface CoordinatorConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  webOrigin?: string;
  oauth: {
    clientId: string;
    redirectUri: string;
    authorizeUrl: string;
  };
  pairing: {
    secret: string;
    timeoutMs: number;
    signInTimeoutMs: number;
  };
  ws: {
    maxPayloadBytes: number;
    rateLimitWindowMs: number;
    rateLimitMaxMessages: number;
  };
  chatWebhookUrl?: string;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): CoordinatorConfig {
  // blank values count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    webOrigin: vars.WEB_ORIGIN,
    oauth: {
      clientId: vars.OAUTH_CLIENT_ID,
      redirectUri: vars.OAUTH_REDIRECT_URI,
      authorizeUrl: vars.OAUTH_AUTHORIZE_URL,
    },
    pairing: {
      secret: vars.PAIRING_SECRET,
      timeoutMs: vars.PAIRING_TIMEOUT_MS,
      signInTimeoutMs: vars.SIGN_IN_TIMEOUT_MS,
    },
    ws: {
      maxPayloadBytes: vars.WS_MAX_PAYLOAD_BYTES,
      rateLimitWindowMs: vars.WS_RATE_LIMIT_WINDOW_MS,
      rateLimitMaxMessages: vars.WS_RATE_LIMIT_MAX_MESSAGES,
    },
    chatWebhookUrl: vars.CHAT_WEBHOOK_URL,
  };
}

export function buildAuthorizeUrl(config: CoordinatorConfig): string {
  const url = new URL(config.oauth.authorizeUrl);
  url.searchParams.set("client_id", config.oauth.clientId);
  url.searchParams.set("redirect_uri", config.oauth.redirectUri);
  url.searchParams.set("scope", "identify");
  url.searchParams.set("response_type", "code");
  return url.toString();
}
