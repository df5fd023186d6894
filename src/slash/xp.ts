import { ChatInputCommandInteraction, SlashCommandBuilder, EmbedBuilder } from "discord.js";
import SlashCommand from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";

const helpText = `
  Command: xp
  Description: The 'xp' command shows the experience you earned from gifts during LIVEs and your rank.
  Subcommands: none
  Examples:
    - Input: /xp
      Output: @viewer Rank: Silver XP: 1,600, Progress to Gold: 3%
`

export const xp: SlashCommand = {
  name: "xp",
  helpText,
  builder: new SlashCommandBuilder()
    .setName("xp")
    .setDescription("Returns your current XP and rank"),
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    await interaction.deferReply();

    const { xpManager } = getServices();
    const currentXp = await xpManager.getXpForMember(guildId, interaction.user.id);

    if (currentXp > 0) {
      const rank = xpManager.getRankByXp(currentXp);
      const next = xpManager.getNextRank(currentXp);
      const progressPercentage = xpManager.getLevelUpProgressPercentage(currentXp);

      const embed = new EmbedBuilder()
        .setTitle(interaction.user.displayName)
        .addFields(
          {
            name: "Rank",
            value: rank.name,
            inline: true
          },
          {
            name: "XP",
            value: new Intl.NumberFormat("en-US").format(currentXp),
            inline: true
          },
          {
            name: next ? `Progress to ${next.name}` : "Progress",
            value: next ? `${progressPercentage.toFixed()}%` : "Top rank reached",
            inline: true
          },
        )
        .setTimestamp()

      return interaction.editReply({ embeds: [embed] })
    } else {
      return interaction.editReply("No XP yet. Link your TikTok with /tokconnect and send gifts during a LIVE!")
    }
  },
};
