import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";

export enum SlashCommandOptionType {
  STRING,
  INTEGER,
  BOOLEAN,
  CHANNEL,
}

export type SlashCommandOption = {
  type: SlashCommandOptionType
  name: string
  description: string
  required?: boolean
  minValue?: number
  maxValue?: number
}

type SlashCommand = {
  name: string
  helpText?: string
  builder: SlashCommandBuilder
  options?: SlashCommandOption[]
  // Restricted to members with Manage Server
  managersOnly?: boolean
  execute: (interaction: ChatInputCommandInteraction) => Promise<unknown>
}

export default SlashCommand
