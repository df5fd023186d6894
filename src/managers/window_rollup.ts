import type { Logger } from "winston";
import type { LeaderboardStore, TallyRecord } from "../db/store";
import { METRIC_KINDS, addToTally, emptyTallies, rankTally, type RankedEntry } from "../models/tally";
import type LiveAggregator from "./live_aggregator";

export type WindowRollup = {
  gifts: RankedEntry[]
  likes: RankedEntry[]
  comments: RankedEntry[]
  sessionIds: number[]
  includesLiveSession: boolean
}

/**
 * Totals over a time window. A session counts in full when any part of it
 * overlaps the window, and the broadcast still in progress is added from
 * memory so reports never lag behind the live counts.
 */
export default class WindowRollupEngine {
  log: Logger;

  constructor(logger: Logger, private store: LeaderboardStore, private aggregator: LiveAggregator) {
    this.log = logger;
  }

  async computeWindow(communityId: string, start: Date, end: Date): Promise<WindowRollup> {
    // Taken before the ledger read; its session's ledger rows are skipped below
    const live = this.aggregator.snapshot(communityId);
    const liveOverlaps = live !== undefined && live.startedAt.getTime() <= end.getTime();

    const sessions = await this.store.findSessionsOverlapping(communityId, start, end);
    const sessionIds = sessions.map(s => s.id);
    const rows = await this.store.listTallies(sessionIds);

    const bySession = new Map<number, TallyRecord[]>();
    for (const row of rows) {
      const list = bySession.get(row.sessionId) ?? [];
      list.push(row);
      bySession.set(row.sessionId, list);
    }

    const totals = emptyTallies();
    for (const session of sessions) {
      if (live && session.id === live.sessionId) continue;
      for (const row of bySession.get(session.id) ?? []) {
        addToTally(totals[row.metricKind], row.performerHandle, row.count);
      }
    }

    if (live && liveOverlaps) {
      for (const kind of METRIC_KINDS) {
        for (const [handle, count] of live.tallies[kind]) {
          addToTally(totals[kind], handle, count);
        }
      }
      if (!sessionIds.includes(live.sessionId)) sessionIds.push(live.sessionId);
    }

    this.log.info(
      `Window roll-up for ${communityId} ${start.toISOString()} -> ${end.toISOString()}: ` +
      `${sessions.length} sessions, live merged: ${liveOverlaps}`
    );

    return {
      gifts: rankTally(totals.gift),
      likes: rankTally(totals.like),
      comments: rankTally(totals.comment),
      sessionIds,
      includesLiveSession: liveOverlaps,
    };
  }
}
