import { AttachmentBuilder, ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand from "../models/slash_command";
import type { DisplayRow } from "../models/tally";
import { getServices } from "../container";

export function sampleBoard(): { left: DisplayRow[]; right: DisplayRow[] } {
  const left: DisplayRow[] = [];
  const right: DisplayRow[] = [];
  for (let i = 1; i <= 10; i++) {
    left.push({ name: `userGifter${i}`, score: 110 - i * 10 });
    right.push({ name: `userTapper${i}`, score: 5000 - i * 250 });
  }
  return { left, right };
}

export const ccTestImage: SlashCommand = {
  name: "cc_test_image",
  managersOnly: true,
  builder: new SlashCommandBuilder()
    .setName("cc_test_image")
    .setDescription("(Admin) Post a test leaderboard with dummy data"),
  execute: async (interaction: ChatInputCommandInteraction) => {
    await interaction.deferReply();
    const { render } = getServices();
    const { left, right } = sampleBoard();
    const image = await render(left, right);

    return interaction.followUp({
      content: "🧪 **LIVE Leaderboard — Test Image**\nLeft: Top Gifters • Right: Top Tappers",
      files: [new AttachmentBuilder(image, { name: "live_leaderboard_TEST.png" })],
    });
  },
};
