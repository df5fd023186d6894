import type { Logger } from "winston";
import type { LeaderboardStore, TallyRecord } from "../db/store";
import type { LiveEvent } from "../models/live_event";
import {
  METRIC_KINDS,
  addToTally,
  cloneTallies,
  emptyTallies,
  rankTally,
  type MetricTallies,
} from "../models/tally";
import { TOP_GIFTER_ROLE } from "../config";
import { SerialQueue, formatHandle, normalizeHandle, positiveIntOr } from "../helpers";
import type XpManager from "./xp_manager";
import type LeaderboardReporter from "./leaderboard_reporter";

// State of the broadcast currently open for one community
type CommunitySession = {
  sessionId: number
  hostHandle: string
  startedAt: Date
  tallies: MetricTallies
}

export type SessionSnapshot = {
  sessionId: number
  startedAt: Date
  tallies: MetricTallies
}

export type LiveAggregatorOptions = {
  xpPerGift: number
  now?: () => Date
}

export default class LiveAggregator {
  log: Logger;
  private sessions = new Map<string, CommunitySession>();
  private queues = new Map<string, SerialQueue>();
  private xpPerGift: number;
  private now: () => Date;

  constructor(
    logger: Logger,
    private store: LeaderboardStore,
    private xpManager: XpManager,
    private reporter: LeaderboardReporter,
    options: LiveAggregatorOptions
  ) {
    this.log = logger;
    this.xpPerGift = options.xpPerGift;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Single entry point for source events. Events for one community run one
   * at a time in arrival order; different communities do not wait on each
   * other. The returned promise settles once the event has been handled and
   * never rejects.
   */
  dispatch(communityId: string, event: LiveEvent): Promise<void> {
    return this.queueFor(communityId)
      .enqueue(() => this.handle(communityId, event))
      .catch(err => this.reporter.capture(`Failed to handle ${event.kind} event for ${communityId}`, err));
  }

  async drain(communityId: string) {
    await this.queues.get(communityId)?.drain();
  }

  hasOpenSession(communityId: string) {
    return this.sessions.has(communityId);
  }

  // Copy of the open session's counts, safe to read across suspension points
  snapshot(communityId: string): SessionSnapshot | undefined {
    const session = this.sessions.get(communityId);
    if (!session) return undefined;
    return {
      sessionId: session.sessionId,
      startedAt: session.startedAt,
      tallies: cloneTallies(session.tallies),
    };
  }

  async onSessionStart(communityId: string, hostHandle: string) {
    const previous = this.sessions.get(communityId);
    if (previous) {
      // No flush here: the previous session's end event never arrived
      this.log.warn(
        `Discarding unflushed session ${previous.sessionId} for ${communityId}: ` +
        `${previous.tallies.gift.size} gifters, ${previous.tallies.like.size} tappers, ${previous.tallies.comment.size} commenters`
      );
      this.sessions.delete(communityId);
    }

    const host = normalizeHandle(hostHandle);
    const startedAt = this.now();
    const sessionId = await this.store.openSession(communityId, host, startedAt);
    this.sessions.set(communityId, { sessionId, hostHandle: host, startedAt, tallies: emptyTallies() });
    this.log.info(`Opened session ${sessionId} for ${communityId} (${formatHandle(host)})`);

    try {
      const cfg = await this.store.getCommunityConfig(communityId);
      if (cfg?.reportChannelId) {
        await this.reporter.postText(cfg.reportChannelId, `🟢 Tracking started for TikTok **${formatHandle(host)}**.`);
      }
    } catch (err) {
      this.reporter.capture(`Failed to announce session ${sessionId} for ${communityId}`, err);
    }
  }

  async onGift(communityId: string, performerHandle: string, repeatCount?: number, diamondValue?: number) {
    const session = this.sessions.get(communityId);
    const handle = normalizeHandle(performerHandle);
    if (!session || !handle) {
      this.log.debug(`Dropping gift from ${performerHandle} in ${communityId}, no open session`);
      return;
    }

    const repeats = positiveIntOr(repeatCount, 1);
    addToTally(session.tallies.gift, handle, repeats);

    const perGift = diamondValue !== undefined && Number.isFinite(diamondValue) && diamondValue > 0
      ? diamondValue
      : this.xpPerGift;
    const xp = repeats * perGift;

    try {
      const memberId = await this.store.getLinkedMember(communityId, handle);
      if (!memberId) return;
      await this.xpManager.award(communityId, memberId, xp);
    } catch (err) {
      this.reporter.capture(`Failed to award ${xp} xp for ${handle} in ${communityId}`, err);
    }
  }

  onLike(communityId: string, performerHandle: string, likeCount?: number) {
    const session = this.sessions.get(communityId);
    const handle = normalizeHandle(performerHandle);
    if (!session || !handle) return;
    addToTally(session.tallies.like, handle, positiveIntOr(likeCount, 1));
  }

  onComment(communityId: string, performerHandle: string) {
    const session = this.sessions.get(communityId);
    const handle = normalizeHandle(performerHandle);
    if (!session || !handle) return;
    addToTally(session.tallies.comment, handle, 1);
  }

  async onSessionEnd(communityId: string) {
    const session = this.sessions.get(communityId);
    if (!session) {
      this.log.warn(`Session end for ${communityId} without an open session`);
      return;
    }

    const endedAt = this.now();
    const records = this.toTallyRecords(communityId, session);
    try {
      await this.store.closeSession(session.sessionId, endedAt, records);
      this.log.info(`Flushed session ${session.sessionId} for ${communityId} (${records.length} tallies)`);
    } catch (err) {
      this.reporter.capture(
        `Failed to flush session ${session.sessionId} for ${communityId}; unflushed tallies: ${JSON.stringify(records)}`,
        err
      );
    } finally {
      // Once the ledger holds the tallies, roll-ups must stop merging memory
      if (this.sessions.get(communityId) === session) {
        this.sessions.delete(communityId);
      }
    }

    const gifts = rankTally(session.tallies.gift);
    const likes = rankTally(session.tallies.like);

    try {
      const cfg = await this.store.getCommunityConfig(communityId);
      if (cfg?.reportChannelId) {
        await this.reporter.postBoard(
          communityId,
          cfg.reportChannelId,
          "🧠 **LIVE Leaderboard — Last LIVE**\nLeft: Top Gifters • Right: Top Tappers",
          gifts,
          likes,
          "live_leaderboard.png"
        );
      } else {
        this.log.warn(`No report channel for ${communityId}, session ${session.sessionId} board not posted`);
      }
    } catch (err) {
      this.reporter.capture(`Failed to post board for session ${session.sessionId}`, err);
    }

    try {
      await this.reporter.rotateRoleToTop(communityId, TOP_GIFTER_ROLE, gifts, "Top gifter of last live");
    } catch (err) {
      this.reporter.capture(`Failed to rotate ${TOP_GIFTER_ROLE} for ${communityId}`, err);
    }
  }

  private async handle(communityId: string, event: LiveEvent): Promise<void> {
    switch (event.kind) {
      case "session-start":
        return this.onSessionStart(communityId, event.hostHandle);
      case "gift":
        return this.onGift(communityId, event.performerHandle, event.repeatCount, event.diamondValue);
      case "like":
        return this.onLike(communityId, event.performerHandle, event.likeCount);
      case "comment":
        return this.onComment(communityId, event.performerHandle);
      case "session-end":
        return this.onSessionEnd(communityId);
    }
  }

  private toTallyRecords(communityId: string, session: CommunitySession): TallyRecord[] {
    const records: TallyRecord[] = [];
    for (const metricKind of METRIC_KINDS) {
      for (const [performerHandle, count] of session.tallies[metricKind]) {
        if (count > 0) {
          records.push({ sessionId: session.sessionId, communityId, performerHandle, metricKind, count });
        }
      }
    }
    return records;
  }

  private queueFor(communityId: string) {
    let queue = this.queues.get(communityId);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(communityId, queue);
    }
    return queue;
  }
}
