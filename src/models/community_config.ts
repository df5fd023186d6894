export type CommunityConfig = {
  communityId: string
  sourceHandle: string | null
  reportChannelId: string | null
  timezone: string
  // ISO weekday, 1 = Monday ... 7 = Sunday
  weeklyDay: number
  weeklyHour: number
  weeklyMinute: number
  monthlyHour: number
  monthlyMinute: number
}

export type CommunityConfigPatch = Partial<Omit<CommunityConfig, "communityId">>;

export const DEFAULT_SCHEDULE = {
  weeklyDay: 6,
  weeklyHour: 19,
  weeklyMinute: 0,
  monthlyHour: 19,
  monthlyMinute: 0,
} as const;
