// packages/server/src/tests/routes.test.ts

import assert from "assert";
import { MESSAGES } from "@netplay/lobby";
import { httpStatusFor } from "../commandResult";
import { buildServer } from "../index";
import { PAIRING_MESSAGES } from "../pairing";
import { RecordingPlatform, pairConnection, sendFrames, testConfig } from "./helpers";

function testStatusMapping() {
  assert.equal(httpStatusFor("BAD_REQUEST"), 400);
  assert.equal(httpStatusFor("INVALID_CODE"), 400);
  assert.equal(httpStatusFor("MALFORMED_TELEMETRY"), 400);
  assert.equal(httpStatusFor("NOT_SIGNED_IN"), 401);
  assert.equal(httpStatusFor("NOT_AUTHENTICATED"), 401);
  assert.equal(httpStatusFor("NOT_OWNER"), 403);
  assert.equal(httpStatusFor("LOBBY_NOT_FOUND"), 404);
  assert.equal(httpStatusFor("UNKNOWN_PAIRING_CODE"), 404);
  assert.equal(httpStatusFor("LOBBY_FULL"), 409);
  assert.equal(httpStatusFor("ALREADY_IN_LOBBY"), 409);
  console.log("routes_status_mapping passed");
}

async function testHealthAndSignIn() {
  const platform = new RecordingPlatform();
  const server = await buildServer({ config: testConfig(), platform });
  try {
    const health = await server.inject({ method: "GET", url: "/health" });
    assert.equal(health.statusCode, 200);
    assert.deepEqual(health.json(), {
      ok: true,
      connections: { anonymous: 0, authenticated: 0 },
    });

    const signIn = await server.inject({
      method: "POST",
      url: "/api/sign-ins",
      payload: { id: "42", username: "carol", mfa_enabled: false, accent_color: null },
    });
    assert.equal(signIn.statusCode, 201);
    assert.deepEqual(signIn.json(), { ok: true });
    const identity = server.coordinator.snapshot().identities["42"];
    assert.equal(identity?.displayName, "carol");
    assert.equal(identity?.profile.mfaEnabled, false);
    assert.strictEqual(identity?.profile.accentColor, null);
    assert.deepEqual(platform.ofType("pairingRequested"), [
      { type: "pairingRequested", identityId: "42" },
    ]);

    const invalid = await server.inject({
      method: "POST",
      url: "/api/sign-ins",
      payload: { id: "not-a-snowflake", username: "carol" },
    });
    assert.equal(invalid.statusCode, 400);
    assert.equal(invalid.json().error, "Invalid request");
  } finally {
    await server.close();
  }
  console.log("routes_health_sign_in passed");
}

async function testConfirmErrors() {
  const server = await buildServer({
    config: testConfig(),
    platform: new RecordingPlatform(),
  });
  try {
    const badCode = await server.inject({
      method: "POST",
      url: "/api/commands/confirm",
      payload: { identityId: "42", code: "not a code" },
    });
    assert.equal(badCode.statusCode, 400);
    assert.deepEqual(badCode.json(), {
      ok: false,
      code: "INVALID_CODE",
      message: PAIRING_MESSAGES.invalidCode,
    });

    const unknown = await server.inject({
      method: "POST",
      url: "/api/commands/confirm",
      payload: { identityId: "42", code: "032B-AB51-1B68-32F2-45E9-F855-1CFB-9BAD" },
    });
    assert.equal(unknown.statusCode, 404);
    assert.deepEqual(unknown.json(), {
      ok: false,
      code: "UNKNOWN_PAIRING_CODE",
      message: PAIRING_MESSAGES.unknownCode,
    });

    const missingBody = await server.inject({ method: "POST", url: "/api/commands/confirm" });
    assert.equal(missingBody.statusCode, 400);
  } finally {
    await server.close();
  }
  console.log("routes_confirm_errors passed");
}

async function testLobbyCommandsOverHttp() {
  const server = await buildServer({
    config: testConfig(),
    platform: new RecordingPlatform(),
  });
  const coordinator = server.coordinator;
  try {
    const unauthenticated = await server.inject({
      method: "POST",
      url: "/api/commands/create",
      payload: { identityId: "42", romName: "R1" },
    });
    assert.equal(unauthenticated.statusCode, 401);
    assert.deepEqual(unauthenticated.json(), {
      ok: false,
      code: "NOT_AUTHENTICATED",
      message: MESSAGES.notAuthenticated,
    });

    const alice = await pairConnection(coordinator, "42", "alice");
    await pairConnection(coordinator, "43", "bob");
    await sendFrames(coordinator, alice, ["GAME LISTR1"]);

    const created = await server.inject({
      method: "POST",
      url: "/api/commands/create",
      payload: { identityId: "42", romName: "R1" },
    });
    assert.equal(created.statusCode, 200);
    assert.deepEqual(created.json(), { ok: true });
    assert.deepEqual(alice.takeSent(), ["CREATE GAMER1"]);

    const listed = await server.inject({ method: "GET", url: "/api/lobbies" });
    const lobbies: Array<{ id: string; ownerName: string; romName: string; joinable: boolean }> =
      listed.json();
    assert.deepEqual(
      lobbies.map(({ id, ownerName, romName, joinable }) => ({ id, ownerName, romName, joinable })),
      [{ id: "42", ownerName: "alice", romName: "R1", joinable: true }]
    );

    const single = await server.inject({ method: "GET", url: "/api/lobbies/42" });
    assert.equal(single.statusCode, 200);
    assert.equal(single.json().telemetryComplete, false);

    const missing = await server.inject({ method: "GET", url: "/api/lobbies/7" });
    assert.equal(missing.statusCode, 404);
    assert.deepEqual(missing.json(), { error: "Lobby not found" });

    const join = await server.inject({
      method: "POST",
      url: "/api/commands/join",
      payload: { identityId: "43", targetId: "42" },
    });
    assert.equal(join.statusCode, 409);
    assert.equal(join.json().code, "ROM_NOT_OWNED");

    const noLobby = await server.inject({
      method: "POST",
      url: "/api/commands/start",
      payload: { identityId: "43" },
    });
    assert.equal(noLobby.statusCode, 409);
    assert.equal(noLobby.json().code, "NO_LOBBY");

    const drop = await server.inject({
      method: "POST",
      url: "/api/commands/drop",
      payload: { identityId: "42" },
    });
    assert.equal(drop.statusCode, 409);
    assert.deepEqual(drop.json(), {
      ok: false,
      code: "LOBBY_NOT_PLAYING",
      message: MESSAGES.notPlaying,
    });

    const leave = await server.inject({
      method: "POST",
      url: "/api/commands/leave",
      payload: { identityId: "42" },
    });
    assert.equal(leave.statusCode, 200);
    assert.deepEqual(alice.takeSent(), ["LEAVE GAME"]);
    assert.deepEqual((await server.inject({ method: "GET", url: "/api/lobbies" })).json(), []);
  } finally {
    await server.close();
  }
  console.log("routes_lobby_commands passed");
}

async function main() {
  testStatusMapping();
  await testHealthAndSignIn();
  await testConfirmErrors();
  await testLobbyCommandsOverHttp();
  console.log("routes tests passed");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
