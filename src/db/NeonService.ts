import { and, asc, desc, eq, gte, inArray, isNull, lte, or, sql } from "drizzle-orm";
import { createDb, type Database } from "./client";
import { guildConfig, linkMap, liveSessions, liveTallies, memberXp, monthlyMarker } from "./schema";
import type { ExperienceRecord, LeaderboardStore, LiveSessionRecord, TallyRecord } from "./store";
import { DEFAULT_SCHEDULE, type CommunityConfig, type CommunityConfigPatch } from "../models/community_config";

type GuildConfigRow = typeof guildConfig.$inferSelect;
type GuildConfigInsert = typeof guildConfig.$inferInsert;

function toCommunityConfig(row: GuildConfigRow): CommunityConfig {
  return {
    communityId: row.guildId,
    sourceHandle: row.tiktokUsername,
    reportChannelId: row.channelId,
    timezone: row.timezone,
    weeklyDay: row.weeklyDay,
    weeklyHour: row.weeklyHour,
    weeklyMinute: row.weeklyMinute,
    monthlyHour: row.monthlyHour,
    monthlyMinute: row.monthlyMinute,
  };
}

function toColumns(patch: CommunityConfigPatch): Partial<GuildConfigInsert> {
  const cols: Partial<GuildConfigInsert> = {};
  if (patch.sourceHandle !== undefined) cols.tiktokUsername = patch.sourceHandle;
  if (patch.reportChannelId !== undefined) cols.channelId = patch.reportChannelId;
  if (patch.timezone !== undefined) cols.timezone = patch.timezone;
  if (patch.weeklyDay !== undefined) cols.weeklyDay = patch.weeklyDay;
  if (patch.weeklyHour !== undefined) cols.weeklyHour = patch.weeklyHour;
  if (patch.weeklyMinute !== undefined) cols.weeklyMinute = patch.weeklyMinute;
  if (patch.monthlyHour !== undefined) cols.monthlyHour = patch.monthlyHour;
  if (patch.monthlyMinute !== undefined) cols.monthlyMinute = patch.monthlyMinute;
  return cols;
}

export default class NeonService implements LeaderboardStore {
  private db: Database;

  constructor(connectionString: string | undefined, private defaultTimezone = "Etc/UTC") {
    this.db = createDb(connectionString);
  }

  async getCommunityConfig(communityId: string) {
    const rows = await this.db.select().from(guildConfig).where(eq(guildConfig.guildId, communityId)).limit(1);
    return rows[0] ? toCommunityConfig(rows[0]) : undefined;
  }

  async upsertCommunityConfig(communityId: string, patch: CommunityConfigPatch) {
    const cols = toColumns(patch);
    const rows = await this.db
      .insert(guildConfig)
      .values({
        guildId: communityId,
        timezone: this.defaultTimezone,
        ...DEFAULT_SCHEDULE,
        ...cols,
      })
      .onConflictDoUpdate({
        target: guildConfig.guildId,
        set: { ...cols, updatedAt: new Date() },
      })
      .returning();
    if (!rows[0]) throw new Error(`Config upsert returned no row for guild ${communityId}`);
    return toCommunityConfig(rows[0]);
  }

  async listCommunityConfigs() {
    const rows = await this.db.select().from(guildConfig);
    return rows.map(toCommunityConfig);
  }

  async linkHandle(communityId: string, handle: string, memberId: string) {
    await this.db
      .insert(linkMap)
      .values({ guildId: communityId, tiktokUsername: handle, discordUserId: memberId })
      .onConflictDoUpdate({
        target: [linkMap.guildId, linkMap.tiktokUsername],
        set: { discordUserId: memberId, updatedAt: new Date() },
      });
  }

  async getLinkedMember(communityId: string, handle: string) {
    const rows = await this.db
      .select({ discordUserId: linkMap.discordUserId })
      .from(linkMap)
      .where(and(eq(linkMap.guildId, communityId), eq(linkMap.tiktokUsername, handle)))
      .limit(1);
    return rows[0]?.discordUserId;
  }

  async openSession(communityId: string, hostHandle: string, startedAt: Date) {
    const rows = await this.db
      .insert(liveSessions)
      .values({ guildId: communityId, tiktokUsername: hostHandle, startedAt })
      .returning({ id: liveSessions.id });
    if (!rows[0]) throw new Error(`Session insert returned no id for guild ${communityId}`);
    return rows[0].id;
  }

  async closeSession(sessionId: number, endedAt: Date, tallies: TallyRecord[]) {
    const close = this.db.update(liveSessions).set({ endedAt }).where(eq(liveSessions.id, sessionId));
    if (tallies.length === 0) {
      await close;
      return;
    }
    const insert = this.db.insert(liveTallies).values(
      tallies.map((t) => ({
        sessionId: t.sessionId,
        guildId: t.communityId,
        tiktokUser: t.performerHandle,
        metricKind: t.metricKind,
        count: t.count,
      }))
    );
    // neon-http runs a batch as one transaction
    await this.db.batch([close, insert]);
  }

  async findSessionsOverlapping(communityId: string, start: Date, end: Date): Promise<LiveSessionRecord[]> {
    const rows = await this.db
      .select()
      .from(liveSessions)
      .where(
        and(
          eq(liveSessions.guildId, communityId),
          lte(liveSessions.startedAt, end),
          or(isNull(liveSessions.endedAt), gte(liveSessions.endedAt, start))
        )
      )
      .orderBy(asc(liveSessions.startedAt), asc(liveSessions.id));
    return rows.map((r) => ({
      id: r.id,
      communityId: r.guildId,
      hostHandle: r.tiktokUsername,
      startedAt: r.startedAt,
      endedAt: r.endedAt,
    }));
  }

  async listTallies(sessionIds: number[]): Promise<TallyRecord[]> {
    if (sessionIds.length === 0) return [];
    const rows = await this.db
      .select()
      .from(liveTallies)
      .where(inArray(liveTallies.sessionId, sessionIds))
      .orderBy(asc(liveTallies.sessionId), asc(liveTallies.id));
    return rows.map((r) => ({
      sessionId: r.sessionId,
      communityId: r.guildId,
      performerHandle: r.tiktokUser,
      metricKind: r.metricKind,
      count: r.count,
    }));
  }

  async addExperience(communityId: string, memberId: string, amount: number) {
    const rows = await this.db
      .insert(memberXp)
      .values({ guildId: communityId, discordUserId: memberId, currentXp: amount })
      .onConflictDoUpdate({
        target: [memberXp.guildId, memberXp.discordUserId],
        set: { currentXp: sql`${memberXp.currentXp} + ${amount}`, updatedAt: new Date() },
      })
      .returning({ currentXp: memberXp.currentXp });
    if (!rows[0]) throw new Error(`XP upsert returned no row for ${memberId}`);
    return rows[0].currentXp;
  }

  async getExperience(communityId: string, memberId: string) {
    const rows = await this.db
      .select({ currentXp: memberXp.currentXp })
      .from(memberXp)
      .where(and(eq(memberXp.guildId, communityId), eq(memberXp.discordUserId, memberId)))
      .limit(1);
    return rows[0]?.currentXp ?? 0;
  }

  async listExperience(communityId: string): Promise<ExperienceRecord[]> {
    const rows = await this.db
      .select()
      .from(memberXp)
      .where(eq(memberXp.guildId, communityId))
      .orderBy(desc(memberXp.currentXp));
    return rows.map((r) => ({ communityId: r.guildId, memberId: r.discordUserId, xp: r.currentXp }));
  }

  async claimMonthlyMarker(communityId: string, yearMonth: string) {
    const rows = await this.db
      .insert(monthlyMarker)
      .values({ guildId: communityId, yearMonth })
      .onConflictDoNothing()
      .returning({ guildId: monthlyMarker.guildId });
    return rows.length > 0;
  }
}
