import { AttachmentBuilder, ChannelType, Client, Guild, Role } from "discord.js";
import type { Logger } from "winston";
import type { Attachment, ChatGateway } from "../models/chat_gateway";

export default class DiscordGateway implements ChatGateway {
  log: Logger;

  constructor(logger: Logger, private client: Client) {
    this.log = logger;
  }

  async postMessage(channelId: string, text: string, attachment?: Attachment) {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel) {
      throw new Error(`Channel ${channelId} not found`);
    }
    if (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement) {
      throw new Error(`Channel ${channelId} is not a text or announcement channel, found type: ${channel.type}`);
    }
    await channel.send({
      content: text,
      files: attachment ? [new AttachmentBuilder(attachment.data, { name: attachment.name })] : [],
    });
  }

  async assignSingleHolderRole(communityId: string, roleName: string, memberId: string, reason: string) {
    const guild = await this.client.guilds.fetch(communityId);
    const role = await this.ensureNamedRole(guild, roleName);
    if (!role) {
      throw new Error(`Role ${roleName} is missing in ${guild.name} and could not be created`);
    }

    // Populate the member cache so role.members is complete
    await guild.members.fetch();
    for (const holder of role.members.values()) {
      if (holder.id === memberId) continue;
      try {
        await holder.roles.remove(role, reason);
      } catch (err) {
        this.log.error(`Failed to remove ${roleName} from ${holder.id}`, err);
      }
    }

    const winner = await guild.members.fetch(memberId);
    if (!winner.roles.cache.has(role.id)) {
      await winner.roles.add(role, reason);
      this.log.info(`${roleName} now held by ${winner.displayName} in ${guild.name}`);
    }
  }

  async resolveDisplayName(communityId: string, memberId: string) {
    try {
      const guild = await this.client.guilds.fetch(communityId);
      const member = await guild.members.fetch(memberId);
      return member.displayName;
    } catch (err) {
      this.log.debug(`Could not fetch member ${memberId} in ${communityId}`, err);
      return undefined;
    }
  }

  async ensureNamedRole(guild: Guild, name: string): Promise<Role | undefined> {
    const existing = guild.roles.cache.find(r => r.name === name);
    if (existing) return existing;
    try {
      return await guild.roles.create({ name, reason: `Auto-create role ${name}` });
    } catch (err) {
      this.log.error(`Failed to create role ${name} in ${guild.name}`, err);
      return undefined;
    }
  }
}
