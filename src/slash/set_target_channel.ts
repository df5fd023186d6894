import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";
import { mentionChannel } from "../helpers";

export const setTargetChannel: SlashCommand = {
  name: "set_target_channel",
  managersOnly: true,
  builder: new SlashCommandBuilder()
    .setName("set_target_channel")
    .setDescription("Set the channel for leaderboard posts"),
  options: [
    {
      type: SlashCommandOptionType.CHANNEL,
      name: "channel",
      description: "Where boards and reports are posted",
      required: true
    }
  ],
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    const channel = interaction.options.getChannel("channel", true);

    await getServices().store.upsertCommunityConfig(guildId, { reportChannelId: channel.id });
    return interaction.reply({ content: `Target channel set to ${mentionChannel(channel.id)}`, ephemeral: true });
  },
};
