import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";
import { getServices } from "../container";
import { requireGuildId } from "../security";
import { formatHandle, mentionUser, normalizeHandle } from "../helpers";

const helpText = `
  Command: tokconnect
  Description: Links your TikTok username to your Discord account so the board shows your name and gifts earn you XP.
  Examples:
    - Input: /tokconnect username:some.viewer
      Output: 🔗 Linked @some.viewer → @you
`

export const tokconnect: SlashCommand = {
  name: "tokconnect",
  helpText,
  builder: new SlashCommandBuilder()
    .setName("tokconnect")
    .setDescription("Link your TikTok username to your Discord"),
  options: [
    {
      type: SlashCommandOptionType.STRING,
      name: "username",
      description: "Your TikTok username, without @",
      required: true
    }
  ],
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    const handle = normalizeHandle(interaction.options.getString("username", true));
    if (!handle) {
      return interaction.reply({ content: "❌ Give me a TikTok username.", ephemeral: true });
    }

    await getServices().store.linkHandle(guildId, handle, interaction.user.id);
    return interaction.reply({ content: `🔗 Linked ${formatHandle(handle)} → ${mentionUser(interaction.user.id)}`, ephemeral: true });
  },
};
