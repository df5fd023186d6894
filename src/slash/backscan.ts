import { ChannelType, ChatInputCommandInteraction, Collection, SlashCommandBuilder } from "discord.js";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";
import { extractHandles, formatHandle } from "../helpers";

const DEFAULT_LIMIT = 200;

export type ScannedMessage = {
  authorId: string
  isBot: boolean
  content: string
}

/**
 * Maps each human author to the TikTok handles they mentioned. When two
 * authors mention the same handle, the later message in the list wins.
 */
export function collectHandleLinks(messages: ScannedMessage[]): Map<string, string> {
  const links = new Map<string, string>();
  for (const msg of messages) {
    if (msg.isBot) continue;
    for (const handle of extractHandles(msg.content)) {
      links.set(handle, msg.authorId);
    }
  }
  return links;
}

export type PagedMessage = {
  id: string
  createdTimestamp: number
}

export type MessagePageFetcher<T extends PagedMessage> = (limit: number, before?: string) => Promise<Collection<string, T>>;

/**
 * Pages backwards through a channel, newest first, until `limit` messages are
 * collected or history runs out. Returns them oldest first, so newer mentions
 * overwrite older ones.
 */
export async function fetchRecent<T extends PagedMessage>(fetchPage: MessagePageFetcher<T>, limit: number): Promise<T[]> {
  const collected: T[] = [];
  let before: string | undefined = undefined;
  while (collected.length < limit) {
    const batch: Collection<string, T> = await fetchPage(Math.min(100, limit - collected.length), before);
    if (batch.size === 0) break;
    const arr: T[] = Array.from(batch.values());
    collected.push(...arr);
    const oldest: T | undefined = arr[arr.length - 1];
    if (!oldest) break;
    before = oldest.id;
  }
  return collected.sort((a, b) => a.createdTimestamp - b.createdTimestamp);
}

export const backscan: SlashCommand = {
  name: "backscan",
  managersOnly: true,
  builder: new SlashCommandBuilder()
    .setName("backscan")
    .setDescription("Admin: scan recent messages for TikTok handles/links and auto-link authors"),
  options: [
    { type: SlashCommandOptionType.INTEGER, name: "limit", description: "Messages to scan (10–2000)", minValue: 10, maxValue: 2000 },
    { type: SlashCommandOptionType.CHANNEL, name: "channel", description: "Channel to scan (defaults to target channel)" },
  ],
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    await interaction.deferReply({ ephemeral: true });

    const { store, client, reporter } = getServices();
    const limit = interaction.options.getInteger("limit") ?? DEFAULT_LIMIT;
    const channelId = interaction.options.getChannel("channel")?.id ?? (await store.getCommunityConfig(guildId))?.reportChannelId;
    const channel = channelId ? await client.channels.fetch(channelId) : null;
    if (!channel || (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement)) {
      return interaction.editReply("❌ No channel to scan. Set one via /set_target_channel or pass a channel.");
    }

    const messages = await fetchRecent(
      (size, before) => channel.messages.fetch(before ? { before, limit: size } : { limit: size }),
      limit
    );
    const links = collectHandleLinks(messages.map(m => ({ authorId: m.author.id, isBot: m.author.bot, content: m.content ?? "" })));
    if (links.size === 0) {
      return interaction.editReply("No TikTok handles found in recent messages.");
    }

    const byAuthor = new Map<string, string[]>();
    for (const [handle, authorId] of links) {
      await store.linkHandle(guildId, handle, authorId);
      byAuthor.set(authorId, [...(byAuthor.get(authorId) ?? []), handle]);
    }

    const lines = ["**Backscan results:**"];
    for (const [authorId, handles] of byAuthor) {
      const name = await reporter.memberName(guildId, authorId);
      lines.push(`• ${name}: ${handles.sort().map(formatHandle).join(", ")}`);
    }
    return interaction.editReply(lines.join("\n").slice(0, 2000));
  },
};
