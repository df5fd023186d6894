import { pgTable, serial, text, integer, bigint, timestamp, primaryKey, index } from "drizzle-orm/pg-core";

// Per-server configuration, created on first write
export const guildConfig = pgTable("guild_config", {
  guildId: text("guildId").primaryKey(),
  tiktokUsername: text("tiktokUsername"),
  channelId: text("channelId"),
  timezone: text("timezone").notNull().default("Etc/UTC"),
  weeklyDay: integer("weeklyDay").notNull().default(6),
  weeklyHour: integer("weeklyHour").notNull().default(19),
  weeklyMinute: integer("weeklyMinute").notNull().default(0),
  monthlyHour: integer("monthlyHour").notNull().default(19),
  monthlyMinute: integer("monthlyMinute").notNull().default(0),
  createdAt: timestamp("createdAt", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updatedAt", { withTimezone: true }).defaultNow().notNull(),
});

// TikTok handle -> Discord member, last write wins
export const linkMap = pgTable("link_map", {
  guildId: text("guildId").notNull(),
  tiktokUsername: text("tiktokUsername").notNull(),
  discordUserId: text("discordUserId").notNull(),
  updatedAt: timestamp("updatedAt", { withTimezone: true }).defaultNow().notNull(),
}, (t) => ({
  pk: primaryKey({ columns: [t.guildId, t.tiktokUsername] }),
}));

export const liveSessions = pgTable("live_session", {
  id: serial("id").primaryKey(),
  guildId: text("guildId").notNull(),
  tiktokUsername: text("tiktokUsername").notNull(),
  startedAt: timestamp("startedAt", { withTimezone: true }).notNull(),
  endedAt: timestamp("endedAt", { withTimezone: true }),
}, (t) => ({
  guildStartedIdx: index("live_session_guild_started_idx").on(t.guildId, t.startedAt),
}));

// Written once per (session, performer, metric) when the session closes
export const liveTallies = pgTable("live_tally", {
  id: serial("id").primaryKey(),
  sessionId: integer("sessionId").notNull().references(() => liveSessions.id),
  guildId: text("guildId").notNull(),
  tiktokUser: text("tiktokUser").notNull(),
  metricKind: text("metricKind", { enum: ["gift", "like", "comment"] }).notNull(),
  count: bigint("count", { mode: "number" }).notNull(),
}, (t) => ({
  sessionIdx: index("live_tally_session_idx").on(t.sessionId),
}));

export const memberXp = pgTable("member_xp", {
  guildId: text("guildId").notNull(),
  discordUserId: text("discordUserId").notNull(),
  currentXp: bigint("currentXp", { mode: "number" }).notNull().default(0),
  updatedAt: timestamp("updatedAt", { withTimezone: true }).defaultNow().notNull(),
}, (t) => ({
  pk: primaryKey({ columns: [t.guildId, t.discordUserId] }),
}));

export const monthlyMarker = pgTable("monthly_marker", {
  guildId: text("guildId").notNull(),
  yearMonth: text("yearMonth").notNull(),
  createdAt: timestamp("createdAt", { withTimezone: true }).defaultNow().notNull(),
}, (t) => ({
  pk: primaryKey({ columns: [t.guildId, t.yearMonth] }),
}));
