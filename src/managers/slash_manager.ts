import { ChannelType, ChatInputCommandInteraction, Client, PermissionFlagsBits } from "discord.js";
import type { Logger } from "winston";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";
import { ConfigurationError, describeError } from "../errors";
import { isManager } from "../security";

export default class SlashCommandManager {
  commands: { [name: string]: SlashCommand } = {};
  log: Logger;

  constructor(logger: Logger, private client: Client) {
    this.log = logger;
  }

  addCommand(command: SlashCommand) {
    const builder = command.builder;
    command.options?.forEach(opt => {
      switch (opt.type) {
        case SlashCommandOptionType.STRING:
          builder.addStringOption(o => o.setName(opt.name).setDescription(opt.description).setRequired(!!opt.required));
          break;
        case SlashCommandOptionType.INTEGER:
          builder.addIntegerOption(o => {
            o.setName(opt.name).setDescription(opt.description).setRequired(!!opt.required);
            if (opt.minValue !== undefined) o.setMinValue(opt.minValue);
            if (opt.maxValue !== undefined) o.setMaxValue(opt.maxValue);
            return o;
          });
          break;
        case SlashCommandOptionType.BOOLEAN:
          builder.addBooleanOption(o => o.setName(opt.name).setDescription(opt.description).setRequired(!!opt.required));
          break;
        case SlashCommandOptionType.CHANNEL:
          builder.addChannelOption(o =>
            o.setName(opt.name)
              .setDescription(opt.description)
              .setRequired(!!opt.required)
              .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
          );
          break;
      }
    });
    if (command.managersOnly) {
      builder.setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild);
    }
    builder.setDMPermission(false);
    this.commands[command.name] = command;
  }

  async registerCommands() {
    const body = Object.values(this.commands).map(c => c.builder.toJSON());
    if (!this.client.application) {
      throw new Error("Client application is not available; register commands after ClientReady");
    }
    await this.client.application.commands.set(body);
    this.log.info(`Registered ${body.length} slash commands`);
  }

  async handleCommand(interaction: ChatInputCommandInteraction) {
    const command = this.commands[interaction.commandName];
    if (!command) {
      this.log.warn(`Unknown command: ${interaction.commandName}`);
      return;
    }

    if (command.managersOnly && !isManager(interaction)) {
      await interaction.reply({ content: "❌ You need the Manage Server permission to do that.", ephemeral: true });
      return;
    }

    try {
      await command.execute(interaction);
    } catch (err) {
      const content = err instanceof ConfigurationError ? err.message : `⚠️ ${describeError(err)}`;
      if (!(err instanceof ConfigurationError)) {
        this.log.error(`Command ${command.name} failed`, err);
      }
      if (interaction.deferred || interaction.replied) {
        await interaction.followUp({ content, ephemeral: true });
      } else {
        await interaction.reply({ content, ephemeral: true });
      }
    }
  }
}
