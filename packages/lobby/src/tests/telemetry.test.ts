// packages/lobby/src/tests/telemetry.test.ts

import assert from "assert";
import type { CoordinatorState, Effect, TelemetryFrame } from "../model";
import { makeLobbySummary } from "../view";
import { mustApply, noticeTypes, rejectionCode, withPlayers } from "./fixtures";

const A = "100";
const B = "200";

function report(state: CoordinatorState, identityId: string, frame: TelemetryFrame) {
  return mustApply(state, { type: "telemetry", identityId, frame });
}

function rosterNotices(effects: Effect[]) {
  return effects.flatMap((effect) =>
    effect.kind === "notice" && effect.notice.type === "rosterReady"
      ? [effect.notice]
      : []
  );
}

function pairedLobby(): CoordinatorState {
  let state = withPlayers([
    { id: A, roms: ["R1"], username: "alice" },
    { id: B, roms: ["R1"], username: "bob" },
  ]);
  state = mustApply(state, { type: "createLobby", identityId: A, romName: "R1" }).state;
  return mustApply(state, { type: "joinLobby", identityId: B, targetId: A }).state;
}

function testRosterPublishedOnce() {
  let state = pairedLobby();
  const steps: Array<[string, TelemetryFrame]> = [
    [A, { tag: "USER PING", value: 40 }],
    [A, { tag: "FRAME DELAY", value: 3 }],
    [B, { tag: "PLAYER NUMBER", value: 2 }],
    [B, { tag: "USER PING", value: 60 }],
  ];
  for (const [identityId, frame] of steps) {
    const applied = report(state, identityId, frame);
    assert.deepEqual(applied.effects, [], `${frame.tag} from ${identityId} is not enough yet`);
    state = applied.state;
  }

  const ready = report(state, B, { tag: "FRAME DELAY", value: 5 });
  assert.deepEqual(rosterNotices(ready.effects), [
    {
      type: "rosterReady",
      lobbyId: A,
      roster: [
        { identityId: A, displayName: "alice", ping: 40, frameDelay: 3, playerSlot: null },
        { identityId: B, displayName: "bob", ping: 60, frameDelay: 5, playerSlot: 2 },
      ],
    },
  ]);

  const again = report(ready.state, B, { tag: "USER PING", value: 105 });
  assert.deepEqual(again.effects, [], "later updates do not republish the same roster");
  assert.equal(again.state.identities[B]?.ping, 105);
  assert.equal(makeLobbySummary(again.state, A)?.telemetryComplete, true);
  console.log("telemetry_roster_once passed");
}

function testRosterRepublishedAfterChange() {
  let state = pairedLobby();
  state = report(state, A, { tag: "USER PING", value: 40 }).state;
  state = report(state, A, { tag: "FRAME DELAY", value: 3 }).state;
  state = report(state, B, { tag: "USER PING", value: 60 }).state;
  state = report(state, B, { tag: "FRAME DELAY", value: 5 }).state;
  assert.equal(state.lobbies[A]?.summaryPublished, true);

  state = withPlayers([{ id: "300", roms: ["R1"] }], state);
  state = mustApply(state, { type: "joinLobby", identityId: "300", targetId: A }).state;
  assert.equal(state.lobbies[A]?.summaryPublished, false, "a new member resets the summary");

  state = report(state, "300", { tag: "USER PING", value: 80 }).state;
  const ready = report(state, "300", { tag: "FRAME DELAY", value: 4 });
  assert.equal(rosterNotices(ready.effects)[0]?.roster.length, 3);

  const started = mustApply(ready.state, { type: "startLobby", identityId: A });
  assert.deepEqual(
    noticeTypes(started.effects),
    ["lobbyStarted", "rosterReady"],
    "start always republishes a complete roster"
  );
  console.log("telemetry_roster_republish passed");
}

function testStartWithIncompleteTelemetry() {
  const started = mustApply(pairedLobby(), { type: "startLobby", identityId: A });
  assert.deepEqual(noticeTypes(started.effects), ["lobbyStarted"]);
  console.log("telemetry_start_incomplete passed");
}

function testTelemetryReportedBeforeLobby() {
  let state = withPlayers([
    { id: A, roms: ["R1"], username: "alice" },
    { id: B, roms: ["R1"], username: "bob" },
  ]);
  state = report(state, A, { tag: "USER PING", value: 40 }).state;
  state = report(state, A, { tag: "FRAME DELAY", value: 3 }).state;
  state = report(state, B, { tag: "USER PING", value: 60 }).state;
  state = report(state, B, { tag: "FRAME DELAY", value: 5 }).state;

  const created = mustApply(state, { type: "createLobby", identityId: A, romName: "R1" });
  assert.deepEqual(noticeTypes(created.effects), ["lobbyCreated", "rosterReady"]);
  assert.equal(rosterNotices(created.effects)[0]?.roster.length, 1);
  assert.equal(created.state.lobbies[A]?.summaryPublished, true);

  const joined = mustApply(created.state, { type: "joinLobby", identityId: B, targetId: A });
  assert.deepEqual(noticeTypes(joined.effects), ["memberJoined", "rosterReady"]);
  assert.deepEqual(rosterNotices(joined.effects), [
    {
      type: "rosterReady",
      lobbyId: A,
      roster: [
        { identityId: A, displayName: "alice", ping: 40, frameDelay: 3, playerSlot: null },
        { identityId: B, displayName: "bob", ping: 60, frameDelay: 5, playerSlot: null },
      ],
    },
  ]);
  assert.equal(joined.state.lobbies[A]?.summaryPublished, true);
  console.log("telemetry_reported_before_lobby passed");
}

function testCatalogReplaced() {
  let state = withPlayers([{ id: A, roms: ["R1", "R2"] }]);
  state = report(state, A, { tag: "GAME LIST", roms: ["R3"] }).state;
  assert.deepEqual(state.identities[A]?.contentCatalog, ["R3"]);
  console.log("telemetry_catalog_replaced passed");
}

function testTelemetryRejections() {
  const pending = mustApply(withPlayers([]), {
    type: "signIn",
    profile: { id: A, username: "alice" },
  }).state;
  assert.equal(
    rejectionCode(pending, {
      type: "telemetry",
      identityId: A,
      frame: { tag: "USER PING", value: 1 },
    }),
    "NOT_AUTHENTICATED"
  );

  const solo = withPlayers([{ id: B, roms: [] }]);
  assert.equal(
    rejectionCode(solo, {
      type: "telemetry",
      identityId: B,
      frame: { tag: "SERVER IP", address: "10.0.0.7:27888" },
    }),
    "NO_LOBBY"
  );
  assert.equal(
    report(solo, B, { tag: "USER PING", value: 12 }).state.identities[B]?.ping,
    12,
    "ping is recorded outside a lobby"
  );
  console.log("telemetry_rejections passed");
}

function main() {
  testRosterPublishedOnce();
  testRosterRepublishedAfterChange();
  testStartWithIncompleteTelemetry();
  testTelemetryReportedBeforeLobby();
  testCatalogReplaced();
  testTelemetryRejections();
  console.log("telemetry tests passed");
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
