import type { Logger } from "winston";
import type { ExperienceRecord, LeaderboardStore } from "../db/store";
import { DEFAULT_RANKS, type RankThreshold } from "../data/ranks";

export type RankUp = {
  communityId: string
  memberId: string
  oldRank: RankThreshold
  newRank: RankThreshold
  newTotal: number
}

export type RankUpListener = (event: RankUp) => void | Promise<void>;

export type RankStanding = {
  rank: RankThreshold
  members: ExperienceRecord[]
}

export default class XpManager {
  log: Logger;
  private ranks: RankThreshold[];
  private listeners: RankUpListener[] = [];

  constructor(logger: Logger, private store: LeaderboardStore, ranks: RankThreshold[] = DEFAULT_RANKS) {
    this.log = logger;
    if (ranks.length === 0 || ranks[0].minXp !== 0) {
      throw new Error("Rank table must start with a threshold of 0");
    }
    for (let i = 1; i < ranks.length; i++) {
      if (ranks[i].minXp <= ranks[i - 1].minXp) {
        throw new Error(`Rank thresholds must be strictly increasing (${ranks[i - 1].name} -> ${ranks[i].name})`);
      }
    }
    this.ranks = [...ranks];
  }

  onRankUp(listener: RankUpListener) {
    this.listeners.push(listener);
  }

  /**
   * Adds experience to a member and reports a rank-up when the new total
   * lands in a higher band than the old one.
   */
  async award(communityId: string, memberId: string, amount: number): Promise<RankUp | undefined> {
    if (!Number.isFinite(amount) || amount <= 0) {
      this.log.debug(`Ignoring non-positive xp award of ${amount} for ${memberId}`);
      return undefined;
    }

    const newTotal = await this.store.addExperience(communityId, memberId, amount);
    const previousXp = newTotal - amount;
    this.log.info(`Adding XP for ${memberId} in ${communityId}, was ${previousXp}, now is ${newTotal}`);

    const oldIndex = this.getRankIndexByXp(previousXp);
    const newIndex = this.getRankIndexByXp(newTotal);
    if (newIndex <= oldIndex) {
      return undefined;
    }

    const event: RankUp = {
      communityId,
      memberId,
      oldRank: this.ranks[oldIndex],
      newRank: this.ranks[newIndex],
      newTotal,
    };
    for (const listener of this.listeners) {
      try {
        await listener(event);
      } catch (err) {
        this.log.error(`Rank-up listener failed for ${memberId}`, err);
      }
    }
    return event;
  }

  getRankIndexByXp(xp: number): number {
    let lo = 0;
    let hi = this.ranks.length - 1;
    let found = 0;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.ranks[mid].minXp <= xp) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found;
  }

  getRankByXp(xp: number): RankThreshold {
    return this.ranks[this.getRankIndexByXp(xp)];
  }

  getNextRank(xp: number): RankThreshold | undefined {
    return this.ranks[this.getRankIndexByXp(xp) + 1];
  }

  getLevelUpProgressPercentage(xp: number): number {
    const current = this.getRankByXp(xp);
    const next = this.getNextRank(xp);
    if (!next) return 100;

    const userXpProgress = xp - current.minXp;
    const xpGapBetweenRanks = next.minXp - current.minXp;
    return userXpProgress * 100 / xpGapBetweenRanks;
  }

  async getXpForMember(communityId: string, memberId: string): Promise<number> {
    return this.store.getExperience(communityId, memberId);
  }

  // Highest rank first; ranks nobody holds are left out
  async getStandings(communityId: string): Promise<RankStanding[]> {
    const records = await this.store.listExperience(communityId);
    const sorted = [...records].sort((a, b) => b.xp - a.xp);
    const standings: RankStanding[] = [];
    for (let i = this.ranks.length - 1; i >= 0; i--) {
      const rank = this.ranks[i];
      const upper = this.ranks[i + 1]?.minXp ?? Number.POSITIVE_INFINITY;
      const members = sorted.filter(r => r.xp >= rank.minXp && r.xp < upper);
      if (members.length) standings.push({ rank, members });
    }
    return standings;
  }
}
