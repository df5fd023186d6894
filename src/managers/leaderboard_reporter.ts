import * as Sentry from "@sentry/node";
import type { Logger } from "winston";
import type { LeaderboardStore } from "../db/store";
import type { ChatGateway } from "../models/chat_gateway";
import type { DisplayRow, RankedEntry } from "../models/tally";
import { BOARD_ROWS, type LeaderboardRenderer } from "../render/leaderboard_image";
import { formatHandle, mentionUser } from "../helpers";
import type { RankUp } from "./xp_manager";

/**
 * Turns rankings into what people see: display names, the rendered board and
 * single-holder role rotation. Shared by the live aggregator, the scheduled
 * reports and the slash commands.
 */
export default class LeaderboardReporter {
  log: Logger;

  constructor(
    logger: Logger,
    private store: LeaderboardStore,
    private gateway: ChatGateway,
    private render: LeaderboardRenderer
  ) {
    this.log = logger;
  }

  async displayNameFor(communityId: string, handle: string): Promise<string> {
    const fallback = formatHandle(handle);
    try {
      const memberId = await this.store.getLinkedMember(communityId, handle);
      if (!memberId) return fallback;
      return (await this.gateway.resolveDisplayName(communityId, memberId)) ?? fallback;
    } catch (err) {
      this.log.error(`Failed to resolve display name for ${handle} in ${communityId}`, err);
      return fallback;
    }
  }

  // Display name of a member, or a mention when the platform cannot resolve it
  async memberName(communityId: string, memberId: string): Promise<string> {
    try {
      return (await this.gateway.resolveDisplayName(communityId, memberId)) ?? mentionUser(memberId);
    } catch (err) {
      this.log.error(`Failed to resolve member ${memberId} in ${communityId}`, err);
      return mentionUser(memberId);
    }
  }

  async resolveNames(communityId: string, ranking: RankedEntry[], limit = BOARD_ROWS): Promise<DisplayRow[]> {
    const rows: DisplayRow[] = [];
    for (const entry of ranking.slice(0, limit)) {
      rows.push({ name: await this.displayNameFor(communityId, entry.handle), score: entry.score });
    }
    return rows;
  }

  async postBoard(
    communityId: string,
    channelId: string,
    caption: string,
    gifts: RankedEntry[],
    likes: RankedEntry[],
    filename: string
  ) {
    const left = await this.resolveNames(communityId, gifts);
    const right = await this.resolveNames(communityId, likes);
    const image = await this.render(left, right);
    await this.gateway.postMessage(channelId, caption, { name: filename, data: image });
    this.log.info(`Posted ${filename} to ${channelId} (${left.length} gifters, ${right.length} tappers)`);
  }

  async postText(channelId: string, text: string) {
    await this.gateway.postMessage(channelId, text);
  }

  /**
   * Gives a single-holder role to the linked member behind the top entry.
   * Returns the member id, or undefined when there is nobody to give it to.
   */
  async rotateRoleToTop(communityId: string, roleName: string, ranking: RankedEntry[], reason: string) {
    const top = ranking[0];
    if (!top) return undefined;

    const memberId = await this.store.getLinkedMember(communityId, top.handle);
    if (!memberId) {
      this.log.info(`Top entry ${top.handle} is not linked, ${roleName} stays where it is`);
      return undefined;
    }
    await this.gateway.assignSingleHolderRole(communityId, roleName, memberId, reason);
    return memberId;
  }

  async announceRankUp(event: RankUp) {
    const cfg = await this.store.getCommunityConfig(event.communityId);
    if (!cfg?.reportChannelId) return;
    const name = await this.memberName(event.communityId, event.memberId);
    await this.gateway.postMessage(cfg.reportChannelId, `🔼 **${name}** is now **${event.newRank.name}**!`);
  }

  // Collaborator failures are reported, never rethrown
  capture(context: string, err: unknown) {
    this.log.error(context, err);
    Sentry.captureException(err);
  }
}
