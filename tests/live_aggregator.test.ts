import { beforeEach, describe, expect, it, vi } from "vitest";
import LiveAggregator from "../src/managers/live_aggregator";
import LeaderboardReporter from "../src/managers/leaderboard_reporter";
import XpManager from "../src/managers/xp_manager";
import type { LiveEvent } from "../src/models/live_event";
import { MemoryStore } from "./helpers/memory_store";
import { RecordingGateway, recordingRenderer, silentLogger } from "./helpers/fakes";

const STARTED_AT = new Date("2026-03-07T20:00:00Z");

describe("LiveAggregator", () => {
  let store: MemoryStore;
  let gateway: RecordingGateway;
  let renders: ReturnType<typeof recordingRenderer>["renders"];
  let xpManager: XpManager;
  let reporter: LeaderboardReporter;
  let aggregator: LiveAggregator;

  const send = (...events: LiveEvent[]) => Promise.all(events.map(e => aggregator.dispatch("g1", e)));
  const start = (host = "Host"): LiveEvent => ({ kind: "session-start", hostHandle: host });
  const end: LiveEvent = { kind: "session-end" };
  const gift = (performerHandle: string, repeatCount?: number, diamondValue?: number): LiveEvent =>
    ({ kind: "gift", performerHandle, repeatCount, diamondValue });
  const like = (performerHandle: string, likeCount?: number): LiveEvent => ({ kind: "like", performerHandle, likeCount });
  const comment = (performerHandle: string): LiveEvent => ({ kind: "comment", performerHandle });

  beforeEach(async () => {
    store = new MemoryStore();
    gateway = new RecordingGateway();
    const renderer = recordingRenderer();
    renders = renderer.renders;
    xpManager = new XpManager(silentLogger, store);
    reporter = new LeaderboardReporter(silentLogger, store, gateway, renderer.render);
    aggregator = new LiveAggregator(silentLogger, store, xpManager, reporter, { xpPerGift: 10, now: () => STARTED_AT });
    await store.upsertCommunityConfig("g1", { sourceHandle: "Host", reportChannelId: "c1" });
  });

  it("announces the start of tracking and opens a ledger session", async () => {
    await send(start("@Host"));

    expect(aggregator.hasOpenSession("g1")).toBe(true);
    expect(store.sessions).toEqual([{ id: 1, communityId: "g1", hostHandle: "Host", startedAt: STARTED_AT, endedAt: null }]);
    expect(gateway.posts).toEqual([{ channelId: "c1", text: "🟢 Tracking started for TikTok **@Host**.", attachment: undefined }]);
  });

  it("flushes tallies equal to the sum of event magnitudes", async () => {
    await send(
      start(),
      gift("alice", 3),
      gift("bob"),
      gift("alice", 2),
      like("carol", 15),
      like("alice", 5),
      comment("bob"),
      end
    );

    expect(store.tallies).toEqual([
      { sessionId: 1, communityId: "g1", performerHandle: "alice", metricKind: "gift", count: 5 },
      { sessionId: 1, communityId: "g1", performerHandle: "bob", metricKind: "gift", count: 1 },
      { sessionId: 1, communityId: "g1", performerHandle: "carol", metricKind: "like", count: 15 },
      { sessionId: 1, communityId: "g1", performerHandle: "alice", metricKind: "like", count: 5 },
      { sessionId: 1, communityId: "g1", performerHandle: "bob", metricKind: "comment", count: 1 },
    ]);
    expect(store.sessions[0].endedAt).toEqual(STARTED_AT);
    expect(aggregator.hasOpenSession("g1")).toBe(false);

    expect(renders).toEqual([
      {
        left: [{ name: "@alice", score: 5 }, { name: "@bob", score: 1 }],
        right: [{ name: "@carol", score: 15 }, { name: "@alice", score: 5 }],
      },
    ]);
    const board = gateway.posts[1];
    expect(board.channelId).toBe("c1");
    expect(board.text).toBe("🧠 **LIVE Leaderboard — Last LIVE**\nLeft: Top Gifters • Right: Top Tappers");
    expect(board.attachment?.name).toBe("live_leaderboard.png");
  });

  it("treats missing or invalid counts as one", async () => {
    await send(start(), gift("alice", 0), like("bob", -4), like("bob"), end);
    expect(store.tallies.map(t => [t.performerHandle, t.metricKind, t.count])).toEqual([
      ["alice", "gift", 1],
      ["bob", "like", 2],
    ]);
  });

  it("posts an empty board for a session with no activity", async () => {
    await send(start(), end);
    expect(store.tallies).toEqual([]);
    expect(renders).toEqual([{ left: [], right: [] }]);
    expect(gateway.posts).toHaveLength(2);
    expect(gateway.roles).toEqual([]);
  });

  it("keeps first-seen order for equal scores", async () => {
    await send(start(), gift("zed", 2), gift("amy", 2), like("kim", 1), like("bo", 1), end);
    expect(renders[0].left.map(r => r.name)).toEqual(["@zed", "@amy"]);
    expect(renders[0].right.map(r => r.name)).toEqual(["@kim", "@bo"]);
  });

  it("clears the session even when posting the board fails", async () => {
    await send(start(), like("a", 3));
    gateway.failPosts = true;
    await send(end);

    expect(aggregator.hasOpenSession("g1")).toBe(false);
    expect(store.tallies).toHaveLength(1);
  });

  it("clears the session and still posts when the ledger flush fails", async () => {
    await send(start(), like("a", 3));
    store.closeSessionError = new Error("db down");
    await send(end);

    expect(aggregator.hasOpenSession("g1")).toBe(false);
    expect(store.tallies).toEqual([]);
    expect(renders).toEqual([{ left: [], right: [{ name: "@a", score: 3 }] }]);
  });

  it("gives Top Gifter to the linked top gifter and shows their display name", async () => {
    await store.linkHandle("g1", "alice", "m-alice");
    gateway.displayNames.set("m-alice", "Alice");

    await send(start(), gift("bob", 1), gift("alice", 4), end);

    expect(gateway.roles).toEqual([{ communityId: "g1", roleName: "Top Gifter", memberId: "m-alice" }]);
    expect(renders[0].left).toEqual([{ name: "Alice", score: 4 }, { name: "@bob", score: 1 }]);
  });

  it("leaves roles and experience alone for an unlinked top gifter", async () => {
    await send(start(), gift("bob", 7), end);
    expect(gateway.roles).toEqual([]);
    expect(store.xp.size).toBe(0);
  });

  it("awards experience per gift, using the diamond value when present", async () => {
    await store.linkHandle("g1", "alice", "m-alice");
    await send(start(), gift("alice", 3, 5), gift("alice", 2), end);
    expect(await store.getExperience("g1", "m-alice")).toBe(35);
  });

  it("announces a rank-up in the report channel", async () => {
    xpManager.onRankUp(event => reporter.announceRankUp(event));
    await store.linkHandle("g1", "alice", "m-alice");
    gateway.displayNames.set("m-alice", "Alice");

    await send(start(), gift("alice", 10, 150));

    expect(gateway.posts.map(p => p.text)).toEqual([
      "🟢 Tracking started for TikTok **@Host**.",
      "🔼 **Alice** is now **Silver**!",
    ]);
  });

  it("discards an unflushed session when a new one starts", async () => {
    await send(start(), like("old", 9), start(), like("new", 1), end);

    expect(store.sessions.map(s => [s.id, s.endedAt])).toEqual([[1, null], [2, STARTED_AT]]);
    expect(store.tallies).toEqual([
      { sessionId: 2, communityId: "g1", performerHandle: "new", metricKind: "like", count: 1 },
    ]);
  });

  it("drops events that arrive without an open session", async () => {
    await send(gift("early", 5), like("early", 5), comment("early"), end);
    expect(store.sessions).toEqual([]);
    expect(gateway.posts).toEqual([]);
  });

  it("never rejects from dispatch", async () => {
    vi.spyOn(store, "openSession").mockRejectedValue(new Error("db down"));
    await expect(aggregator.dispatch("g1", start())).resolves.toBeUndefined();
    expect(aggregator.hasOpenSession("g1")).toBe(false);
  });

  it("hands out snapshots that do not change with later events", async () => {
    await send(start(), like("a", 2));
    const snap = aggregator.snapshot("g1");
    await send(like("a", 3));

    expect(snap?.sessionId).toBe(1);
    expect(snap?.tallies.like.get("a")).toBe(2);
    expect(aggregator.snapshot("g1")?.tallies.like.get("a")).toBe(5);
    expect(aggregator.snapshot("g2")).toBeUndefined();
  });

  it("does not post when no report channel is configured", async () => {
    await store.upsertCommunityConfig("g1", { reportChannelId: null });
    await send(start(), like("a", 1), end);
    expect(gateway.posts).toEqual([]);
    expect(store.tallies).toHaveLength(1);
  });
});
