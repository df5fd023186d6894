import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";
import { formatHandle } from "../helpers";

export const startTiktok: SlashCommand = {
  name: "start_tiktok",
  builder: new SlashCommandBuilder()
    .setName("start_tiktok")
    .setDescription("Start TikTok tracking for this server"),
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    await interaction.deferReply({ ephemeral: true });

    // Configuration errors surface to the caller through the command manager
    const handle = await getServices().tracking.start(guildId);
    return interaction.editReply(`🟢 Started TikTok tracking for ${formatHandle(handle)}.`);
  },
};

export const stopTiktok: SlashCommand = {
  name: "stop_tiktok",
  builder: new SlashCommandBuilder()
    .setName("stop_tiktok")
    .setDescription("Stop TikTok tracking"),
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    const stopped = getServices().tracking.stop(guildId);
    return interaction.reply({
      content: stopped ? "🛑 Stopped TikTok tracking." : "Nothing is being tracked right now.",
      ephemeral: true,
    });
  },
};
