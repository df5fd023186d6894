import type { CommunityConfig, CommunityConfigPatch } from "../models/community_config";
import type { MetricKind } from "../models/tally";

export type LiveSessionRecord = {
  id: number
  communityId: string
  hostHandle: string
  startedAt: Date
  endedAt: Date | null
}

export type TallyRecord = {
  sessionId: number
  communityId: string
  performerHandle: string
  metricKind: MetricKind
  count: number
}

export type ExperienceRecord = {
  communityId: string
  memberId: string
  xp: number
}

/**
 * Everything the bot persists. NeonService is the Postgres implementation;
 * tests run against an in-process one.
 */
export interface LeaderboardStore {
  getCommunityConfig(communityId: string): Promise<CommunityConfig | undefined>
  upsertCommunityConfig(communityId: string, patch: CommunityConfigPatch): Promise<CommunityConfig>
  listCommunityConfigs(): Promise<CommunityConfig[]>

  linkHandle(communityId: string, handle: string, memberId: string): Promise<void>
  getLinkedMember(communityId: string, handle: string): Promise<string | undefined>

  openSession(communityId: string, hostHandle: string, startedAt: Date): Promise<number>
  // Sets ended_at and writes the session's tallies in one batch
  closeSession(sessionId: number, endedAt: Date, tallies: TallyRecord[]): Promise<void>
  // Sessions with started_at <= end and (ended_at is null or ended_at >= start), oldest first
  findSessionsOverlapping(communityId: string, start: Date, end: Date): Promise<LiveSessionRecord[]>
  // Rows ordered by session, then insertion
  listTallies(sessionIds: number[]): Promise<TallyRecord[]>

  // Atomically adds to the member's total and returns the new total
  addExperience(communityId: string, memberId: string, amount: number): Promise<number>
  getExperience(communityId: string, memberId: string): Promise<number>
  listExperience(communityId: string): Promise<ExperienceRecord[]>

  // Returns false when the marker already existed
  claimMonthlyMarker(communityId: string, yearMonth: string): Promise<boolean>
}
