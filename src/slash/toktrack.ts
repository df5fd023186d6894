import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";
import { formatHandle, normalizeHandle } from "../helpers";

export const toktrack: SlashCommand = {
  name: "toktrack",
  managersOnly: true,
  builder: new SlashCommandBuilder()
    .setName("toktrack")
    .setDescription("Admin: set the TikTok host account to track"),
  options: [
    {
      type: SlashCommandOptionType.STRING,
      name: "username",
      description: "TikTok host username, without @",
      required: true
    }
  ],
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    const handle = normalizeHandle(interaction.options.getString("username", true));
    if (!handle) {
      return interaction.reply({ content: "❌ Give me a TikTok username.", ephemeral: true });
    }

    await getServices().store.upsertCommunityConfig(guildId, { sourceHandle: handle });
    return interaction.reply({ content: `✅ Host set to ${formatHandle(handle)}`, ephemeral: true });
  },
};
