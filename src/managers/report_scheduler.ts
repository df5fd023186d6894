import { DateTime } from "luxon";
import type { Logger } from "winston";
import type { LeaderboardStore } from "../db/store";
import type { CommunityConfig } from "../models/community_config";
import { LINK_REMINDER_TEXT, SORE_FINGER_ROLE } from "../config";
import { mentionUser } from "../helpers";
import type LeaderboardReporter from "./leaderboard_reporter";
import type WindowRollupEngine from "./window_rollup";
import type XpManager from "./xp_manager";

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;
const DISCORD_MESSAGE_LIMIT = 2000;
const MEMBERS_PER_RANK = 10;

export type StandingLine = {
  rankName: string
  members: { name: string; xp: number }[]
}

export function toLocalTime(now: Date, timezone: string): DateTime {
  const local = DateTime.fromJSDate(now, { zone: timezone });
  return local.isValid ? local : DateTime.fromJSDate(now, { zone: "utc" });
}

// Minute-resolution equality: a tick that misses the minute skips the week
export function isWeeklyDue(cfg: CommunityConfig, local: DateTime): boolean {
  return local.weekday === cfg.weeklyDay && local.hour === cfg.weeklyHour && local.minute === cfg.weeklyMinute;
}

export function isMonthlyDue(cfg: CommunityConfig, local: DateTime): boolean {
  return local.day === 1 && local.hour === cfg.monthlyHour && local.minute === cfg.monthlyMinute;
}

export function yearMonthKey(local: DateTime): string {
  return local.toFormat("yyyy-LL");
}

export function isoWeekKey(local: DateTime): string {
  return `${local.weekYear}-W${String(local.weekNumber).padStart(2, "0")}`;
}

export function formatStandingsMessage(title: string, standings: StandingLine[]): string {
  if (standings.length === 0) {
    return `${title}\nNo experience earned yet.`;
  }
  const number = new Intl.NumberFormat("en-US");
  const lines = [title];
  for (const standing of standings) {
    lines.push(`**${standing.rankName}**`);
    standing.members.forEach((m, i) => lines.push(`${i + 1}. ${m.name} — ${number.format(m.xp)} XP`));
  }
  const text = lines.join("\n");
  return text.length <= DISCORD_MESSAGE_LIMIT ? text : `${text.slice(0, DISCORD_MESSAGE_LIMIT - 1)}…`;
}

/**
 * Fires the weekly and monthly reports. Driven by a once-a-minute tick; each
 * community is checked against its own timezone and schedule.
 */
export default class ReportScheduler {
  log: Logger;
  // communityId -> ISO week already reported from this process
  private weeklyFired = new Map<string, string>();

  constructor(
    logger: Logger,
    private store: LeaderboardStore,
    private rollup: WindowRollupEngine,
    private reporter: LeaderboardReporter,
    private xpManager: XpManager
  ) {
    this.log = logger;
  }

  async tick(now: Date = new Date()) {
    const configs = await this.store.listCommunityConfigs();
    for (const cfg of configs) {
      if (!cfg.reportChannelId) continue;
      const local = toLocalTime(now, cfg.timezone);

      if (isWeeklyDue(cfg, local)) {
        try {
          await this.runWeeklyReport(cfg, now, local);
        } catch (err) {
          this.reporter.capture(`Weekly report failed for ${cfg.communityId}`, err);
        }
      }

      if (isMonthlyDue(cfg, local)) {
        try {
          await this.runMonthlyReport(cfg, now, local);
        } catch (err) {
          this.reporter.capture(`Monthly report failed for ${cfg.communityId}`, err);
        }
      }
    }
  }

  async runWeeklyReport(cfg: CommunityConfig, now: Date, local: DateTime) {
    const channelId = cfg.reportChannelId;
    if (!channelId) return;

    const week = isoWeekKey(local);
    if (this.weeklyFired.get(cfg.communityId) === week) {
      this.log.info(`Weekly report for ${cfg.communityId} already posted for ${week}`);
      return;
    }
    this.weeklyFired.set(cfg.communityId, week);

    const rollup = await this.rollup.computeWindow(cfg.communityId, new Date(now.getTime() - WEEK_MS), now);
    await this.reporter.postBoard(
      cfg.communityId,
      channelId,
      "📅 **LIVE Leaderboard — Weekly Summary**\nLeft: Top Gifters • Right: Top Tappers",
      rollup.gifts,
      rollup.likes,
      "live_leaderboard_weekly.png"
    );
    await this.reporter.postText(channelId, LINK_REMINDER_TEXT);

    const winner = await this.reporter.rotateRoleToTop(cfg.communityId, SORE_FINGER_ROLE, rollup.likes, "Weekly top tapper");
    if (winner) {
      await this.reporter.postText(channelId, `🖐️ ${mentionUser(winner)} now has sore fingers!`);
    }
  }

  /**
   * The month's marker is written before anything is posted: if posting
   * fails the month counts as reported and is not retried.
   */
  async runMonthlyReport(cfg: CommunityConfig, now: Date, local: DateTime) {
    const channelId = cfg.reportChannelId;
    if (!channelId) return;

    const month = yearMonthKey(local);
    const claimed = await this.store.claimMonthlyMarker(cfg.communityId, month);
    if (!claimed) {
      this.log.info(`Monthly report for ${cfg.communityId} already posted for ${month}`);
      return;
    }

    const rollup = await this.rollup.computeWindow(cfg.communityId, new Date(0), now);
    await this.reporter.postBoard(
      cfg.communityId,
      channelId,
      "🏆 **LIVE Leaderboard — All Time**\nLeft: Top Gifters • Right: Top Tappers",
      rollup.gifts,
      rollup.likes,
      "live_leaderboard_all_time.png"
    );

    const standings = await this.xpManager.getStandings(cfg.communityId);
    const lines: StandingLine[] = [];
    for (const standing of standings) {
      const members: StandingLine["members"] = [];
      for (const record of standing.members.slice(0, MEMBERS_PER_RANK)) {
        members.push({ name: await this.reporter.memberName(cfg.communityId, record.memberId), xp: record.xp });
      }
      lines.push({ rankName: standing.rank.name, members });
    }
    const title = `🏅 **Rank Standings — ${local.setLocale("en-US").toFormat("LLLL yyyy")}**`;
    await this.reporter.postText(channelId, formatStandingsMessage(title, lines));
  }
}
