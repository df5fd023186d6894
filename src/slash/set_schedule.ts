import { ChatInputCommandInteraction, SlashCommandBuilder } from "discord.js";
import { IANAZone } from "luxon";
import SlashCommand, { SlashCommandOptionType } from "../models/slash_command";
import type { CommunityConfig, CommunityConfigPatch } from "../models/community_config";
import { ConfigurationError } from "../errors";
import { getServices } from "../container";
import { requireGuildId } from "../security";

const WEEKDAYS = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"];

export type ScheduleInput = {
  timezone?: string | null
  weeklyDay?: number | null
  weeklyHour?: number | null
  weeklyMinute?: number | null
  monthlyHour?: number | null
  monthlyMinute?: number | null
}

function inRange(name: string, value: number | null | undefined, min: number, max: number) {
  if (value === null || value === undefined) return undefined;
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`❌ ${name} must be between ${min} and ${max}.`, "INVALID_SCHEDULE");
  }
  return value;
}

export function buildSchedulePatch(input: ScheduleInput): CommunityConfigPatch {
  const patch: CommunityConfigPatch = {};
  if (input.timezone) {
    const timezone = input.timezone.trim();
    if (!IANAZone.isValidZone(timezone)) {
      throw new ConfigurationError(`❌ Unknown timezone \`${timezone}\`. Use an IANA name such as \`America/Chicago\`.`, "INVALID_TIMEZONE");
    }
    patch.timezone = timezone;
  }
  const weeklyDay = inRange("weekday", input.weeklyDay, 1, 7);
  const weeklyHour = inRange("hour", input.weeklyHour, 0, 23);
  const weeklyMinute = inRange("minute", input.weeklyMinute, 0, 59);
  const monthlyHour = inRange("monthly_hour", input.monthlyHour, 0, 23);
  const monthlyMinute = inRange("monthly_minute", input.monthlyMinute, 0, 59);
  if (weeklyDay !== undefined) patch.weeklyDay = weeklyDay;
  if (weeklyHour !== undefined) patch.weeklyHour = weeklyHour;
  if (weeklyMinute !== undefined) patch.weeklyMinute = weeklyMinute;
  if (monthlyHour !== undefined) patch.monthlyHour = monthlyHour;
  if (monthlyMinute !== undefined) patch.monthlyMinute = monthlyMinute;
  return patch;
}

const pad = (n: number) => String(n).padStart(2, "0");

export function describeSchedule(cfg: CommunityConfig): string {
  return [
    `🗓️ Weekly: ${WEEKDAYS[cfg.weeklyDay - 1] ?? `day ${cfg.weeklyDay}`} ${pad(cfg.weeklyHour)}:${pad(cfg.weeklyMinute)}`,
    `Monthly: day 1 ${pad(cfg.monthlyHour)}:${pad(cfg.monthlyMinute)}`,
    `Timezone: ${cfg.timezone}`,
  ].join(" • ");
}

export const setSchedule: SlashCommand = {
  name: "set_schedule",
  managersOnly: true,
  builder: new SlashCommandBuilder()
    .setName("set_schedule")
    .setDescription("Admin: set the timezone and when weekly/monthly reports are posted"),
  options: [
    { type: SlashCommandOptionType.STRING, name: "timezone", description: "IANA timezone, e.g. America/Chicago" },
    { type: SlashCommandOptionType.INTEGER, name: "weekday", description: "1 = Monday ... 7 = Sunday", minValue: 1, maxValue: 7 },
    { type: SlashCommandOptionType.INTEGER, name: "hour", description: "Weekly report hour (0-23)", minValue: 0, maxValue: 23 },
    { type: SlashCommandOptionType.INTEGER, name: "minute", description: "Weekly report minute (0-59)", minValue: 0, maxValue: 59 },
    { type: SlashCommandOptionType.INTEGER, name: "monthly_hour", description: "Monthly report hour (0-23)", minValue: 0, maxValue: 23 },
    { type: SlashCommandOptionType.INTEGER, name: "monthly_minute", description: "Monthly report minute (0-59)", minValue: 0, maxValue: 59 },
  ],
  execute: async (interaction: ChatInputCommandInteraction) => {
    const guildId = requireGuildId(interaction);
    const patch = buildSchedulePatch({
      timezone: interaction.options.getString("timezone"),
      weeklyDay: interaction.options.getInteger("weekday"),
      weeklyHour: interaction.options.getInteger("hour"),
      weeklyMinute: interaction.options.getInteger("minute"),
      monthlyHour: interaction.options.getInteger("monthly_hour"),
      monthlyMinute: interaction.options.getInteger("monthly_minute"),
    });

    const cfg = await getServices().store.upsertCommunityConfig(guildId, patch);
    return interaction.reply({ content: describeSchedule(cfg), ephemeral: true });
  },
};
