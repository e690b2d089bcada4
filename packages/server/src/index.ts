// packages/server/src/index.ts

import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { loadConfig, type CoordinatorConfig } from "./config";
import { Coordinator } from "./coordinator";
import { LoggingChatPlatform, WebhookChatPlatform, type ChatPlatform } from "./platform";
import { registerRoutes } from "./routes";
import { registerCoordinatorWebSocket } from "./ws";

declare module "fastify" {
  interface FastifyInstance {
    coordinator: Coordinator;
  }
}

function isLocalDevOrigin(origin: string): boolean {
  return /^http:\/\/(localhost|127\.0\.0\.1|0\.0\.0\.0|\[::1\])(:\d+)?$/.test(
    origin
  );
}

export interface BuildServerOptions {
  config?: CoordinatorConfig;
  platform?: ChatPlatform;
  now?: () => number;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const server = Fastify({ logger: { level: config.logLevel } });

  await server.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      if (config.webOrigin && origin === config.webOrigin) return cb(null, true);
      if (isLocalDevOrigin(origin)) return cb(null, true);
      cb(new Error("Not allowed by CORS"), false);
    },
  });

  await server.register(websocket, {
    options: { maxPayload: config.ws.maxPayloadBytes },
  });

  const platform =
    options.platform ??
    (config.chatWebhookUrl
      ? new WebhookChatPlatform(config.chatWebhookUrl)
      : new LoggingChatPlatform(server.log));

  const coordinator = new Coordinator({
    config,
    logger: server.log,
    platform,
    now: options.now,
  });
  server.decorate("coordinator", coordinator);
  server.addHook("onClose", async () => {
    await coordinator.stop();
  });

  await registerRoutes(server, coordinator);
  registerCoordinatorWebSocket(server, coordinator);

  return server;
}

async function start() {
  const config = loadConfig();
  const server = await buildServer({ config });
  try {
    const address = await server.listen({ port: config.port, host: config.host });
    server.log.info(`coordinator listening on ${address}`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}

export { Coordinator } from "./coordinator";
export { loadConfig } from "./config";
export type { ChatPlatform } from "./platform";
