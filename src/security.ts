import { Interaction, PermissionFlagsBits } from "discord.js";

export function isManager(interaction: Interaction) {
  return interaction.memberPermissions?.has(PermissionFlagsBits.ManageGuild) ?? false;
}

export function requireGuildId(interaction: Interaction): string {
  if (!interaction.guildId) {
    throw new Error("This command only works inside a server.");
  }
  return interaction.guildId;
}
