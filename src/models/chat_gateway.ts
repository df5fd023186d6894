export type Attachment = {
  name: string
  data: Buffer
}

/**
 * What the bot needs from the chat platform. DiscordGateway talks to
 * discord.js; tests use a recording fake.
 */
export interface ChatGateway {
  postMessage(channelId: string, text: string, attachment?: Attachment): Promise<void>
  // Revokes the role from every other holder and grants it to memberId
  assignSingleHolderRole(communityId: string, roleName: string, memberId: string, reason: string): Promise<void>
  resolveDisplayName(communityId: string, memberId: string): Promise<string | undefined>
}
