import type { RemoteResult } from "../backend/src/services/remoteStatClient";
import { createStringStatsManager } from "../backend/src/services/statsManager";
import {
  createDeferred,
  createManualTicker,
  createRecordingLogger,
  createScriptedRemoteClient,
  remoteFail,
  remoteOk,
  type ScriptedRemoteBehavior
} from "./testDoubles";

function setup(behavior: ScriptedRemoteBehavior = {}) {
  let now = 1_000_000;
  const ticker = createManualTicker();
  const remote = createScriptedRemoteClient(behavior);
  const logger = createRecordingLogger();
  const manager = createStringStatsManager({
    remote,
    ticker,
    logger,
    nowMs: () => now,
    flushCooldownMs: 5_000,
    failureBackoffMs: 60_000
  });
  return {
    manager,
    remote,
    ticker,
    logger,
    advance(ms: number): void {
      now += ms;
    }
  };
}

describe("statsManager", () => {
  it("Given invalid stats manager dependencies When createStringStatsManager is called Then it throws deterministically", () => {
    const remote = createScriptedRemoteClient();
    expect(() => createStringStatsManager({ remote, ticker: createManualTicker(), flushCooldownMs: -1 })).toThrow(
      "statsManager requires flushCooldownMs to be >= 0."
    );
    expect(() => createStringStatsManager({ remote, ticker: createManualTicker(), failureBackoffMs: Number.NaN })).toThrow(
      "statsManager requires failureBackoffMs to be >= 0."
    );
  });

  it("Given a new local user When addLocalUser is called twice Then the second call fails with ALREADY_REGISTERED And one event is queued", () => {
    const { manager, ticker } = setup();

    expect(manager.addLocalUser("u1")).toEqual({ ok: true, value: undefined });
    expect(manager.addLocalUser("u1")).toEqual({
      ok: false,
      error: { code: "ALREADY_REGISTERED", message: "User is already registered with the stats manager.", context: { userId: "u1" } }
    });

    expect(manager.doWork()).toEqual([{ sequence: 1, type: "local_user_added", producer: "stats", userId: "u1", error: null }]);
    expect(manager.doWork()).toEqual([]);
    expect(manager.listLocalUsers()).toEqual(["u1"]);
    expect(ticker.startCount()).toBe(1);
  });

  it("Given an unknown user When removeLocalUser is called Then it fails with USER_NOT_REGISTERED", () => {
    const { manager } = setup();

    expect(manager.removeLocalUser("u2")).toEqual({
      ok: false,
      error: { code: "USER_NOT_REGISTERED", message: "User is not registered with the stats manager.", context: { userId: "u2" } }
    });
    expect(manager.addLocalUser(" ")).toEqual({
      ok: false,
      error: { code: "INVALID_USER", message: "User cannot be identified." }
    });
  });

  it("Given the last local user When removeLocalUser is called Then the auto flush ticker stops And a removal event is queued", () => {
    const { manager, ticker } = setup();
    manager.addLocalUser("u1");

    expect(manager.removeLocalUser("u1").ok).toBe(true);

    expect(ticker.isRunning()).toBe(false);
    expect(manager.doWork().map((event) => event.type)).toEqual(["local_user_added", "local_user_removed"]);
    expect(manager.getStatNames("u1").ok).toBe(false);
  });

  it("Given a number stat When a string is written to it Then it fails with TYPE_MISMATCH And the value is unchanged", () => {
    const { manager } = setup();
    manager.addLocalUser("u1");

    expect(manager.setStatAsNumber("u1", "score", 10).ok).toBe(true);
    expect(manager.setStatAsString("u1", "score", "x")).toEqual({
      ok: false,
      error: {
        code: "TYPE_MISMATCH",
        message: 'Stat "score" is a number.',
        context: { name: "score", expected: "number", actual: "string" }
      }
    });
    expect(manager.getStat("u1", "score")).toEqual({
      ok: true,
      value: { name: "score", value: { kind: "number", value: 10 }, dirty: true }
    });
  });

  it("Given a number stat When it is overwritten Then the latest value is reported", () => {
    const { manager } = setup();
    manager.addLocalUser("u1");

    manager.setStatAsNumber("u1", "score", 10);
    manager.setStatAsNumber("u1", "score", 20);

    const stat = manager.getStat("u1", "score");
    expect(stat.ok && stat.value.value).toEqual({ kind: "number", value: 20 });
  });

  it("Given integer writes When values have fractions or exceed the safe range Then they are truncated or rejected", () => {
    const { manager } = setup();
    manager.addLocalUser("u1");

    manager.setStatAsInteger("u1", "level", 7.9);
    expect(manager.getStat("u1", "level")).toEqual({ ok: true, value: { name: "level", value: { kind: "number", value: 7 }, dirty: true } });

    manager.setStatAsInteger("u1", "level", -3.7);
    const negative = manager.getStat("u1", "level");
    expect(negative.ok && negative.value.value).toEqual({ kind: "number", value: -3 });

    manager.setStatAsInteger("u1", "level", Number.MAX_SAFE_INTEGER);
    const largest = manager.getStat("u1", "level");
    expect(largest.ok && largest.value.value).toEqual({ kind: "number", value: Number.MAX_SAFE_INTEGER });

    expect(manager.setStatAsInteger("u1", "level", 2 ** 53)).toEqual({
      ok: false,
      error: { code: "INVALID_STAT_VALUE", message: "Stat value is outside the safe integer range." }
    });
    expect(manager.setStatAsNumber("u1", "ratio", Number.POSITIVE_INFINITY)).toEqual({
      ok: false,
      error: { code: "INVALID_STAT_VALUE", message: "Stat value must be a finite number.", context: { name: "ratio" } }
    });
  });

  it("Given a string stat When a value longer than 63 characters is written Then it fails with VALUE_TOO_LONG And the entry is unchanged", () => {
    const { manager } = setup();
    manager.addLocalUser("u1");
    manager.setStatAsString("u1", "title", "novice");

    expect(manager.setStatAsString("u1", "title", "x".repeat(64))).toEqual({
      ok: false,
      error: { code: "VALUE_TOO_LONG", message: "Stat value is too long.", context: { name: "title", maxLength: 63 } }
    });
    const title = manager.getStat("u1", "title");
    expect(title.ok && title.value.value).toEqual({ kind: "string", value: "novice" });

    expect(manager.setStatAsString("u1", "title", "y".repeat(63)).ok).toBe(true);
  });

  it("Given invalid stat names When stats are written Then they fail with INVALID_STAT_NAME", () => {
    const { manager } = setup();
    manager.addLocalUser("u1");

    expect(manager.setStatAsNumber("u1", "", 1)).toEqual({
      ok: false,
      error: { code: "INVALID_STAT_NAME", message: "Stat name is required." }
    });
    expect(manager.setStatAsNumber("u1", "n".repeat(64), 1)).toEqual({
      ok: false,
      error: { code: "INVALID_STAT_NAME", message: "Stat name is too long.", context: { maxLength: 63 } }
    });
    expect(manager.getStatNames("u1")).toEqual({ ok: true, value: [] });
  });

  it("Given stats for a user When they are read Then names are listed And missing stats or users are reported", () => {
    const { manager } = setup();
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 1);
    manager.setStatAsString("u1", "title", "novice");

    expect(manager.getStatNames("u1")).toEqual({ ok: true, value: ["score", "title"] });
    expect(manager.getStat("u1", "wins")).toEqual({
      ok: false,
      error: { code: "STAT_NOT_FOUND", message: 'Stat "wins" not found.', context: { name: "wins" } }
    });
    expect(manager.getStat("u9", "score")).toEqual({
      ok: false,
      error: { code: "USER_NOT_REGISTERED", message: "User is not registered with the stats manager.", context: { userId: "u9" } }
    });
    expect(manager.setStatAsNumber("u9", "score", 1).ok).toBe(false);
  });

  it("Given a missing stat When deleteStat is called Then it fails with STAT_NOT_FOUND And the document is unchanged", () => {
    const { manager } = setup();
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 1);

    expect(manager.deleteStat("u1", "wins")).toEqual({
      ok: false,
      error: { code: "STAT_NOT_FOUND", message: 'Stat "wins" not found.', context: { name: "wins" } }
    });
    expect(manager.getStatNames("u1")).toEqual({ ok: true, value: ["score"] });
  });

  it("Given a flushed stat When it is deleted Then the next flush sends the deletion once", async () => {
    const { manager, remote, ticker } = setup();
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 1);
    ticker.tick();
    await manager.settle();

    expect(manager.deleteStat("u1", "score").ok).toBe(true);
    expect(manager.getStatNames("u1")).toEqual({ ok: true, value: [] });
    ticker.tick();
    await manager.settle();
    ticker.tick();
    await manager.settle();

    expect(remote.flushes).toEqual([
      { userId: "u1", upserts: [{ name: "score", value: { kind: "number", value: 1 } }], deletes: [] },
      { userId: "u1", upserts: [], deletes: ["score"] }
    ]);
  });

  it("Given a recent forced flush When a normal priority flush is requested within the cooldown Then it fails with THROTTLED", async () => {
    const { manager, remote, advance } = setup();
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 10);

    expect(manager.requestFlushToService("u1").ok).toBe(true);
    advance(2_000);
    expect(manager.requestFlushToService("u1", false)).toEqual({
      ok: false,
      error: { code: "THROTTLED", message: "Flush requested too soon after the previous one.", context: { retryAfterMs: 3_000 } }
    });
    advance(3_000);
    expect(manager.requestFlushToService("u1", false).ok).toBe(true);
    await manager.settle();

    expect(remote.flushes).toEqual([
      { userId: "u1", upserts: [{ name: "score", value: { kind: "number", value: 10 } }], deletes: [] }
    ]);
    const completions = manager.doWork().filter((event) => event.type === "stat_update_complete");
    expect(completions.map((event) => event.error)).toEqual([null, null]);
  });

  it("Given high priority flush requests When they arrive back to back Then both are accepted", async () => {
    const { manager } = setup();
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 10);

    expect(manager.requestFlushToService("u1", true).ok).toBe(true);
    expect(manager.requestFlushToService("u1", true).ok).toBe(true);
    await manager.settle();

    expect(manager.getStat("u1", "score")).toEqual({
      ok: true,
      value: { name: "score", value: { kind: "number", value: 10 }, dirty: false }
    });
  });

  it("Given a mutation When the auto flush ticks Then do_work yields a successful stat_update_complete for that user", async () => {
    const { manager, remote, ticker } = setup();
    manager.addLocalUser("u1");
    manager.doWork();
    manager.setStatAsString("u1", "title", "novice");

    ticker.tick();
    await manager.settle();

    expect(manager.doWork()).toEqual([{ sequence: 2, type: "stat_update_complete", producer: "stats", userId: "u1", error: null }]);
    const title = manager.getStat("u1", "title");
    expect(title.ok && title.value.dirty).toBe(false);

    ticker.tick();
    await manager.settle();
    expect(remote.flushes).toHaveLength(1);
  });

  it("Given nothing is dirty When a flush is forced Then it completes without contacting the remote side", async () => {
    const { manager, remote } = setup();
    manager.addLocalUser("u1");
    manager.doWork();

    expect(manager.requestFlushToService("u1").ok).toBe(true);
    await manager.settle();

    expect(remote.flushes).toEqual([]);
    expect(manager.doWork()).toEqual([{ sequence: 2, type: "stat_update_complete", producer: "stats", userId: "u1", error: null }]);
  });

  it("Given a stat changes while its flush is in flight When the flush succeeds Then the newer value stays dirty", async () => {
    const pending = createDeferred<RemoteResult<number>>();
    const { manager, remote, ticker } = setup({ flush: () => pending.promise });
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 1);

    manager.requestFlushToService("u1", true);
    manager.setStatAsNumber("u1", "score", 2);
    pending.resolve(remoteOk(5));
    await manager.settle();

    expect(manager.getStat("u1", "score")).toEqual({
      ok: true,
      value: { name: "score", value: { kind: "number", value: 2 }, dirty: true }
    });

    ticker.tick();
    await manager.settle();
    expect(remote.flushes.map((delta) => delta.upserts)).toEqual([
      [{ name: "score", value: { kind: "number", value: 1 } }],
      [{ name: "score", value: { kind: "number", value: 2 } }]
    ]);
  });

  it("Given the remote flush fails When the cycle completes Then the error is reported through do_work And the user backs off", async () => {
    const { manager, remote, ticker, logger, advance } = setup({ flush: async () => remoteFail("HTTP_500", "boom") });
    manager.addLocalUser("u1");
    manager.doWork();
    manager.setStatAsNumber("u1", "score", 1);

    ticker.tick();
    await manager.settle();

    expect(manager.doWork()).toEqual([
      {
        sequence: 2,
        type: "stat_update_complete",
        producer: "stats",
        userId: "u1",
        error: { code: "TRANSPORT_ERROR", message: "boom", context: { transportCode: "HTTP_500" } }
      }
    ]);
    expect(logger.lines).toContain("error: Stats flush (auto) failed for u1: boom");
    const score = manager.getStat("u1", "score");
    expect(score.ok && score.value.dirty).toBe(true);

    ticker.tick();
    await manager.settle();
    expect(remote.flushes).toHaveLength(1);

    advance(60_000);
    ticker.tick();
    await manager.settle();
    expect(remote.flushes).toHaveLength(2);
  });

  it("Given dirty stats When the user is removed Then a final flush is sent without queuing an outcome", async () => {
    const { manager, remote } = setup();
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 3);

    manager.removeLocalUser("u1");
    await manager.settle();

    expect(remote.flushes).toEqual([
      { userId: "u1", upserts: [{ name: "score", value: { kind: "number", value: 3 } }], deletes: [] }
    ]);
    expect(manager.doWork().map((event) => event.type)).toEqual(["local_user_added", "local_user_removed"]);
  });

  it("Given a flush in flight When the user is removed Then the late outcome is dropped", async () => {
    const pending = createDeferred<RemoteResult<number>>();
    const { manager, remote, logger } = setup({ flush: () => pending.promise });
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 3);
    manager.requestFlushToService("u1", true);

    manager.removeLocalUser("u1");
    pending.resolve(remoteOk(5));
    await manager.settle();

    expect(remote.flushes).toHaveLength(1);
    expect(logger.lines).toContain("info: Dropping flush outcome for removed user u1.");
    expect(manager.doWork().map((event) => event.type)).toEqual(["local_user_added", "local_user_removed"]);
  });

  it("Given a registered user When a leaderboard is requested Then the call returns immediately And the result arrives through do_work", async () => {
    const { manager, remote } = setup({
      queryLeaderboard: async (_userId, request) =>
        remoteOk({
          statName: request.statName,
          totalRowCount: 1,
          rows: [{ rank: 1, userId: "u1", value: 42 }],
          nextQuery: null
        })
    });
    manager.addLocalUser("u1");
    manager.doWork();

    expect(manager.getLeaderboard("u1", "score")).toEqual({ ok: true, value: undefined });
    expect(manager.doWork()).toEqual([]);
    await manager.settle();

    expect(remote.leaderboardRequests).toEqual([
      { userId: "u1", request: { statName: "score", skipToRank: 0, maxItems: 10, order: "descending" } }
    ]);
    expect(manager.doWork()).toEqual([
      {
        sequence: 2,
        type: "get_leaderboard_complete",
        producer: "stats",
        userId: "u1",
        error: null,
        leaderboard: { statName: "score", totalRowCount: 1, rows: [{ rank: 1, userId: "u1", value: 42 }], nextQuery: null }
      }
    ]);
  });

  it("Given a social leaderboard request When it is admitted Then the social group and query are forwarded", async () => {
    const { manager, remote } = setup();
    manager.addLocalUser("u1");

    expect(manager.getSocialLeaderboard("u1", "score", "friends", { maxItems: 5, order: "ascending" }).ok).toBe(true);
    await manager.settle();

    expect(remote.leaderboardRequests).toEqual([
      { userId: "u1", request: { statName: "score", socialGroup: "friends", skipToRank: 0, maxItems: 5, order: "ascending" } }
    ]);
  });

  it("Given invalid leaderboard requests When they are made Then only admission errors are returned", () => {
    const { manager, remote } = setup();

    expect(manager.getLeaderboard("u1", "score").ok).toBe(false);
    manager.addLocalUser("u1");
    expect(manager.getLeaderboard("u1", "score", { maxItems: 0 })).toEqual({
      ok: false,
      error: { code: "INVALID_QUERY", message: "maxItems must be between 1 and 100." }
    });
    expect(manager.getLeaderboard("u1", "score", { skipToRank: -1 })).toEqual({
      ok: false,
      error: { code: "INVALID_QUERY", message: "skipToRank must be a non-negative integer." }
    });
    expect(manager.getSocialLeaderboard("u1", "score", " ")).toEqual({
      ok: false,
      error: { code: "INVALID_QUERY", message: "Social group is required." }
    });
    expect(remote.leaderboardRequests).toEqual([]);
  });

  it("Given the leaderboard query fails When it completes Then the failure is carried on the event", async () => {
    const { manager } = setup({
      queryLeaderboard: async () => {
        throw new Error("timeout");
      }
    });
    manager.addLocalUser("u1");
    manager.doWork();

    manager.getLeaderboard("u1", "score");
    await manager.settle();

    expect(manager.doWork()).toEqual([
      {
        sequence: 2,
        type: "get_leaderboard_complete",
        producer: "stats",
        userId: "u1",
        error: { code: "TRANSPORT_ERROR", message: "timeout" }
      }
    ]);
  });

  it("Given pending work When close is called Then the ticker stops And in-flight flushes settle", async () => {
    const pending = createDeferred<RemoteResult<number>>();
    const { manager, ticker } = setup({ flush: () => pending.promise });
    manager.addLocalUser("u1");
    manager.setStatAsNumber("u1", "score", 1);
    manager.requestFlushToService("u1", true);

    const closing = manager.close();
    expect(ticker.isRunning()).toBe(false);
    pending.resolve(remoteOk(5));
    await closing;

    const score = manager.getStat("u1", "score");
    expect(score.ok && score.value.dirty).toBe(false);
  });

  it("Given dirty stats and no flush in flight When close is called Then the stats are sent once before it resolves", async () => {
    const { manager, remote } = setup();
    manager.addLocalUser("u1");
    manager.addLocalUser("u2");
    manager.setStatAsNumber("u1", "score", 42);
    manager.doWork();

    await manager.close();

    expect(remote.flushes).toEqual([
      { userId: "u1", upserts: [{ name: "score", value: { kind: "number", value: 42 } }], deletes: [] }
    ]);
    const score = manager.getStat("u1", "score");
    expect(score.ok && score.value.dirty).toBe(false);
    expect(manager.doWork()).toEqual([]);
  });
});
