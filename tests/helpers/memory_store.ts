import type { ExperienceRecord, LeaderboardStore, LiveSessionRecord, TallyRecord } from "../../src/db/store";
import { METRIC_KINDS } from "../../src/models/tally";
import { DEFAULT_SCHEDULE, type CommunityConfig, type CommunityConfigPatch } from "../../src/models/community_config";

/**
 * In-process LeaderboardStore with the same ordering guarantees as the
 * Postgres one.
 */
export class MemoryStore implements LeaderboardStore {
  configs = new Map<string, CommunityConfig>();
  links = new Map<string, string>();
  sessions: LiveSessionRecord[] = [];
  tallies: TallyRecord[] = [];
  xp = new Map<string, number>();
  markers = new Set<string>();
  closeSessionError?: Error;

  async getCommunityConfig(communityId: string) {
    const cfg = this.configs.get(communityId);
    return cfg ? { ...cfg } : undefined;
  }

  async upsertCommunityConfig(communityId: string, patch: CommunityConfigPatch) {
    const current: CommunityConfig = this.configs.get(communityId) ?? {
      communityId,
      sourceHandle: null,
      reportChannelId: null,
      timezone: "Etc/UTC",
      ...DEFAULT_SCHEDULE,
    };
    const next = { ...current, ...patch };
    this.configs.set(communityId, next);
    return { ...next };
  }

  async listCommunityConfigs() {
    return Array.from(this.configs.values()).map(c => ({ ...c }));
  }

  async linkHandle(communityId: string, handle: string, memberId: string) {
    this.links.set(`${communityId}:${handle}`, memberId);
  }

  async getLinkedMember(communityId: string, handle: string) {
    return this.links.get(`${communityId}:${handle}`);
  }

  async openSession(communityId: string, hostHandle: string, startedAt: Date) {
    const id = this.sessions.length + 1;
    this.sessions.push({ id, communityId, hostHandle, startedAt, endedAt: null });
    return id;
  }

  async closeSession(sessionId: number, endedAt: Date, tallies: TallyRecord[]) {
    if (this.closeSessionError) throw this.closeSessionError;
    const session = this.sessions.find(s => s.id === sessionId);
    if (!session) throw new Error(`Unknown session ${sessionId}`);
    session.endedAt = endedAt;
    this.tallies.push(...tallies.map(t => ({ ...t })));
  }

  async findSessionsOverlapping(communityId: string, start: Date, end: Date) {
    return this.sessions
      .filter(s =>
        s.communityId === communityId &&
        s.startedAt.getTime() <= end.getTime() &&
        (s.endedAt === null || s.endedAt.getTime() >= start.getTime())
      )
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime() || a.id - b.id)
      .map(s => ({ ...s }));
  }

  async listTallies(sessionIds: number[]) {
    return this.tallies
      .filter(t => sessionIds.includes(t.sessionId))
      .sort((a, b) => a.sessionId - b.sessionId)
      .map(t => ({ ...t }));
  }

  async addExperience(communityId: string, memberId: string, amount: number) {
    const key = `${communityId}:${memberId}`;
    const next = (this.xp.get(key) ?? 0) + amount;
    this.xp.set(key, next);
    return next;
  }

  async getExperience(communityId: string, memberId: string) {
    return this.xp.get(`${communityId}:${memberId}`) ?? 0;
  }

  async listExperience(communityId: string): Promise<ExperienceRecord[]> {
    const records: ExperienceRecord[] = [];
    for (const [key, xp] of this.xp) {
      const [community, memberId] = key.split(":");
      if (community === communityId) records.push({ communityId, memberId, xp });
    }
    return records.sort((a, b) => b.xp - a.xp);
  }

  async claimMonthlyMarker(communityId: string, yearMonth: string) {
    const key = `${communityId}:${yearMonth}`;
    if (this.markers.has(key)) return false;
    this.markers.add(key);
    return true;
  }

  // Test helper: a session that already ended with the given tallies
  async seedClosedSession(
    communityId: string,
    startedAt: Date,
    endedAt: Date,
    counts: Partial<Record<TallyRecord["metricKind"], Record<string, number>>>
  ) {
    const id = await this.openSession(communityId, "host", startedAt);
    const rows: TallyRecord[] = [];
    for (const metricKind of METRIC_KINDS) {
      for (const [performerHandle, count] of Object.entries(counts[metricKind] ?? {})) {
        rows.push({ sessionId: id, communityId, performerHandle, metricKind, count });
      }
    }
    await this.closeSession(id, endedAt, rows);
    return id;
  }
}
