import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";

// Command list, or one command's help text when a name is given
export function buildHelp(commands: SlashCommand[], name?: string | null): string {
  if (name) {
    const wanted = name.trim().replace(/^\//, "");
    const command = commands.find(c => c.name === wanted);
    if (!command) {
      return `❌ Unknown command \`/${wanted}\`.`;
    }
    if (!command.helpText) {
      return `/${command.name}: ${command.builder.description}`;
    }
    return "```\n" + command.helpText.replace(/^ {2}/gm, "").trim() + "\n```";
  }

  const lines = ["**Commands**"];
  for (const command of [...commands].sort((a, b) => a.name.localeCompare(b.name))) {
    lines.push(`• /${command.name} — ${command.builder.description}`);
  }
  lines.push("Use `/help command:<name>` for details.");
  return lines.join("\n");
}

export function createHelpCommand(listCommands: () => SlashCommand[]): SlashCommand {
  return {
    name: "help",
    builder: new SlashCommandBuilder()
      .setName("help")
      .setDescription("Lists the bot's commands"),
    options: [
      {
        type: SlashCommandOptionType.STRING,
        name: "command",
        description: "Show details for one command"
      }
    ],
    execute: async (interaction: ChatInputCommandInteraction) => {
      const content = buildHelp(listCommands(), interaction.options.getString("command"));
      return interaction.reply({ content: content.slice(0, 2000), ephemeral: true });
    },
  };
}
