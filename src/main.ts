import path from "path";
import * as Sentry from "@sentry/node";
import { config, SORE_FINGER_ROLE, TOP_GIFTER_ROLE } from "./config";

if (config.sentryDsn) {
  Sentry.init({
    dsn: config.sentryDsn,
    tracesSampleRate: 1.0,
  });
}

import { Client, Events, GatewayIntentBits, Interaction } from "discord.js";
import { logger as log } from "./logger";

// Commands
import { xp } from "./slash/xp";
import { tokconnect } from "./slash/tokconnect";
import { toktrack } from "./slash/toktrack";
import { setTargetChannel } from "./slash/set_target_channel";
import { setSchedule } from "./slash/set_schedule";
import { startTiktok, stopTiktok } from "./slash/tracking";
import { postConnectPrompt } from "./slash/post_connect_prompt";
import { backscan } from "./slash/backscan";
import { ccTestImage } from "./slash/cc_test_image";
import { leaderboard } from "./slash/leaderboard";
import { createHelpCommand } from "./slash/help";

import NeonService from "./db/NeonService";
import XpManager from "./managers/xp_manager";
import LeaderboardReporter from "./managers/leaderboard_reporter";
import LiveAggregator from "./managers/live_aggregator";
import WindowRollupEngine from "./managers/window_rollup";
import ReportScheduler from "./managers/report_scheduler";
import TrackingManager from "./managers/tracking_manager";
import DiscordGateway from "./managers/discord_gateway";
import SlashCommandManager from "./managers/slash_manager";
import ScheduledJobManager from "./managers/scheduled_job_manager";
import { registerServices } from "./container";
import { asyncForEach } from "./helpers";
import { createLeaderboardRenderer } from "./render/leaderboard_image";
import TikTokLiveSource from "./sources/tiktok_source";
import { startKeepAlive } from "./keepalive";
import { reportTickJob } from "./jobs/report_tick";
import { liveProbeJob } from "./jobs/live_probe";

if (!config.botToken) {
  log.error("❌ Missing DISCORD_BOT_TOKEN in environment");
  process.exit(1);
}

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
  ],
});

const store = new NeonService(config.databaseUrl, config.defaultTimezone);
const gateway = new DiscordGateway(log, client);
const render = createLeaderboardRenderer(config.backgroundImage ?? path.join(config.assetsDir, "leaderboard_bg.png"));
const xpManager = new XpManager(log, store);
const reporter = new LeaderboardReporter(log, store, gateway, render);
const aggregator = new LiveAggregator(log, store, xpManager, reporter, { xpPerGift: config.xpPerGift });
const rollup = new WindowRollupEngine(log, store, aggregator);
const scheduler = new ReportScheduler(log, store, rollup, reporter, xpManager);
const tracking = new TrackingManager(log, store, aggregator, handle => new TikTokLiveSource(handle, log, config.tiktokSessionId));

xpManager.onRankUp(event => reporter.announceRankUp(event));

registerServices({ client, log, config, store, xpManager, reporter, aggregator, rollup, tracking, scheduler, render });

const slashCommandManager = new SlashCommandManager(log, client);
const scheduledJobManager = new ScheduledJobManager(log);

async function ensureRoles(guildId: string) {
  const guild = await client.guilds.fetch(guildId);
  await gateway.ensureNamedRole(guild, SORE_FINGER_ROLE);
  await gateway.ensureNamedRole(guild, TOP_GIFTER_ROLE);
}

client.on(Events.ClientReady, async () => {
  try {
    slashCommandManager.addCommand(tokconnect);
    slashCommandManager.addCommand(toktrack);
    slashCommandManager.addCommand(setTargetChannel);
    slashCommandManager.addCommand(setSchedule);
    slashCommandManager.addCommand(startTiktok);
    slashCommandManager.addCommand(stopTiktok);
    slashCommandManager.addCommand(postConnectPrompt);
    slashCommandManager.addCommand(backscan);
    slashCommandManager.addCommand(ccTestImage);
    slashCommandManager.addCommand(xp);
    slashCommandManager.addCommand(leaderboard);
    slashCommandManager.addCommand(createHelpCommand(() => Object.values(slashCommandManager.commands)));
    await slashCommandManager.registerCommands();

    await asyncForEach(client.guilds.cache.keys(), ensureRoles);

    scheduledJobManager.registerJob(reportTickJob);
    scheduledJobManager.registerJob(liveProbeJob);

    log.info("=====")
    log.info("Registered slash commands:");
    Object.keys(slashCommandManager.commands).forEach(c => log.info(c));
    log.info("=====")
  } catch (err) {
    log.error("Init failed:", err);
    Sentry.captureException(err);
  }

  log.info(`${client?.user?.username} is ready!`);
});

client.on(Events.Error, e => {
  log.error(`${client?.user?.username} borked: ${e}`);
  Sentry.captureException(e);
});

client.on(Events.GuildCreate, async guild => {
  try {
    await ensureRoles(guild.id);
  } catch (err) {
    log.error(`Role bootstrap failed for ${guild.id}`, err);
  }
});

client.on(Events.GuildMemberAdd, async member => {
  try {
    await member.send(
      "👋 Welcome!\n\nTo appear on the LIVE leaderboard and earn roles like **Top Gifter** or **Sore Finger**, " +
      "please link your TikTok by using the command: `/tokconnect your_tiktok_name` (without @)."
    );
  } catch (err) {
    log.info(`Could not DM ${member.user.username}: ${err}`);
  }
});

/** Slash Commands */
client.on(Events.InteractionCreate, async (interaction: Interaction) => {
  if (!interaction.isChatInputCommand()) return;

  try {
    await slashCommandManager.handleCommand(interaction);
  } catch (err) {
    log.error(`Interaction ${interaction.commandName} failed`, err);
  }
});

const keepAlive = startKeepAlive(config.port, log);

function shutdown(signal: string) {
  log.info(`Received ${signal}, shutting down`);
  scheduledJobManager.stopAll();
  tracking.stopAll();
  keepAlive.close();
  client.destroy()
    .catch(err => log.error("Client destroy failed", err))
    .finally(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

client.login(config.botToken).catch(err => {
  log.error("Login failed", err);
  process.exit(1);
});
