import winston from "winston";
import type { Attachment, ChatGateway } from "../../src/models/chat_gateway";
import type { DisplayRow } from "../../src/models/tally";
import type { LeaderboardRenderer } from "../../src/render/leaderboard_image";

export const silentLogger = winston.createLogger({ silent: true });

export type PostedMessage = {
  channelId: string
  text: string
  attachment?: Attachment
}

export class RecordingGateway implements ChatGateway {
  posts: PostedMessage[] = [];
  roles: { communityId: string; roleName: string; memberId: string }[] = [];
  displayNames = new Map<string, string>();
  failPosts = false;
  failRoles = false;

  async postMessage(channelId: string, text: string, attachment?: Attachment) {
    if (this.failPosts) throw new Error("post failed");
    this.posts.push({ channelId, text, attachment });
  }

  async assignSingleHolderRole(communityId: string, roleName: string, memberId: string) {
    if (this.failRoles) throw new Error("role failed");
    this.roles.push({ communityId, roleName, memberId });
  }

  async resolveDisplayName(_communityId: string, memberId: string) {
    return this.displayNames.get(memberId);
  }
}

export function recordingRenderer() {
  const renders: { left: DisplayRow[]; right: DisplayRow[] }[] = [];
  const render: LeaderboardRenderer = async (left, right) => {
    renders.push({ left, right });
    return Buffer.from("png");
  };
  return { render, renders };
}
