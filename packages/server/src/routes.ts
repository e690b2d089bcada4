// packages/server/src/routes.ts

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { makeLobbySummary } from "@netplay/lobby";
import { z } from "zod";
import { httpStatusFor, type CommandResult } from "./commandResult";
import type { Coordinator } from "./coordinator";
import {
  ConfirmPairingBodySchema,
  CreateLobbyBodySchema,
  IdentityCommandBodySchema,
  JoinLobbyBodySchema,
  LobbyParamsSchema,
  SignInBodySchema,
} from "./schemas";

function sendValidationError(reply: FastifyReply, error: z.ZodError) {
  reply.code(400).send({ error: "Invalid request", details: error.flatten() });
}

function sendResult(
  reply: FastifyReply,
  result: CommandResult,
  successStatus = 200
) {
  if (result.ok) {
    reply.code(successStatus).send({ ok: true });
    return;
  }
  reply
    .code(httpStatusFor(result.code))
    .send({ ok: false, code: result.code, message: result.message });
}

type IdentityCommand = (identityId: string) => Promise<CommandResult>;

export async function registerRoutes(
  server: FastifyInstance,
  coordinator: Coordinator
) {
  server.get("/", async () => ({
    name: "netplay-coordinator",
    version: process.env.npm_package_version ?? "unknown",
  }));

  server.get("/health", async () => ({
    ok: true,
    connections: {
      anonymous: coordinator.anonymous.size,
      authenticated: coordinator.authenticated.size,
    },
  }));

  server.get("/api/lobbies", async () => coordinator.listLobbies());

  server.get(
    "/api/lobbies/:id",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const params = LobbyParamsSchema.safeParse(request.params);
      if (!params.success) {
        return sendValidationError(reply, params.error);
      }
      const summary = makeLobbySummary(coordinator.snapshot(), params.data.id);
      if (!summary) {
        reply.code(404).send({ error: "Lobby not found" });
        return;
      }
      reply.send(summary);
    }
  );

  // OAuth callback result: the signed-in user's profile
  server.post(
    "/api/sign-ins",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = SignInBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const result = await coordinator.pairing.signIn(parsed.data);
      sendResult(reply, result, 201);
    }
  );

  server.post(
    "/api/commands/confirm",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = ConfirmPairingBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const { identityId, code } = parsed.data;
      sendResult(reply, await coordinator.pairing.confirm(identityId, code));
    }
  );

  server.post(
    "/api/commands/create",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = CreateLobbyBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const { identityId, romName } = parsed.data;
      sendResult(reply, await coordinator.lobbies.create(identityId, romName));
    }
  );

  server.post(
    "/api/commands/join",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = JoinLobbyBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const { identityId, targetId } = parsed.data;
      sendResult(reply, await coordinator.lobbies.join(identityId, targetId));
    }
  );

  const identityCommands: Record<string, IdentityCommand> = {
    leave: (identityId) => coordinator.lobbies.leave(identityId),
    start: (identityId) => coordinator.lobbies.start(identityId),
    drop: (identityId) => coordinator.lobbies.drop(identityId),
  };

  for (const [name, command] of Object.entries(identityCommands)) {
    server.post(
      `/api/commands/${name}`,
      async (request: FastifyRequest, reply: FastifyReply) => {
        const parsed = IdentityCommandBodySchema.safeParse(request.body ?? {});
        if (!parsed.success) {
          return sendValidationError(reply, parsed.error);
        }
        sendResult(reply, await command(parsed.data.identityId));
      }
    );
  }
}
