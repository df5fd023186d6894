import { ChannelType, ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";

export const postConnectPrompt: SlashCommand = {
  name: "post_connect_prompt",
  managersOnly: true,
  builder: new SlashCommandBuilder()
    .setName("post_connect_prompt")
    .setDescription("Post & pin the connect prompt (admin)"),
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    const { store, client, config, log } = getServices();
    const cfg = await store.getCommunityConfig(guildId);
    const channel = cfg?.reportChannelId ? await client.channels.fetch(cfg.reportChannelId) : null;
    if (!channel || (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement)) {
      return interaction.reply({ content: "❌ Set a target channel first with /set_target_channel", ephemeral: true });
    }

    await interaction.deferReply({ ephemeral: true });
    const msg = await channel.send(config.connectPromptText);
    try {
      await msg.pin();
    } catch (err) {
      log.warn(`Could not pin connect prompt in ${channel.id}`, err);
    }
    return interaction.editReply("✅ Posted and pinned connect prompt.");
  },
};
