import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";

const DAY_MS = 24 * 60 * 60 * 1000;

export const leaderboard: SlashCommand = {
  name: "leaderboard",
  builder: new SlashCommandBuilder()
    .setName("leaderboard")
    .setDescription("Post the gifter/tapper board for the last few days in this channel"),
  options: [
    {
      type: SlashCommandOptionType.INTEGER,
      name: "days",
      description: "How many days back (default 7)",
      minValue: 1,
      maxValue: 365
    }
  ],
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    await interaction.deferReply({ ephemeral: true });

    const { rollup, reporter } = getServices();
    const days = interaction.options.getInteger("days") ?? 7;
    const end = new Date();
    const result = await rollup.computeWindow(guildId, new Date(end.getTime() - days * DAY_MS), end);

    await reporter.postBoard(
      guildId,
      interaction.channelId,
      `📊 **LIVE Leaderboard — Last ${days} day${days === 1 ? "" : "s"}**\nLeft: Top Gifters • Right: Top Tappers`,
      result.gifts,
      result.likes,
      "live_leaderboard_window.png"
    );
    return interaction.editReply(`Leaderboard posted for the last ${days} day${days === 1 ? "" : "s"}.`);
  },
};
