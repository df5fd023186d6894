import type { Client } from "discord.js";
import type { Logger } from "winston";
import type { LeaderboardStore } from "./db/store";
import type LeaderboardReporter from "./managers/leaderboard_reporter";
import type LiveAggregator from "./managers/live_aggregator";
import type ReportScheduler from "./managers/report_scheduler";
import type TrackingManager from "./managers/tracking_manager";
import type WindowRollupEngine from "./managers/window_rollup";
import type XpManager from "./managers/xp_manager";
import type { BotConfig } from "./config";
import type { LeaderboardRenderer } from "./render/leaderboard_image";

export type BotServices = {
  client: Client
  log: Logger
  config: BotConfig
  store: LeaderboardStore
  xpManager: XpManager
  reporter: LeaderboardReporter
  aggregator: LiveAggregator
  rollup: WindowRollupEngine
  tracking: TrackingManager
  scheduler: ReportScheduler
  render: LeaderboardRenderer
}

let services: BotServices | undefined;

export function registerServices(instance: BotServices) {
  services = instance;
}

export function getServices(): BotServices {
  if (!services) {
    throw new Error("Services have not been registered yet");
  }
  return services;
}
