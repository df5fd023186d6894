import ScheduledJob from "../models/scheduled_job";
import { getServices } from "../container";

// Each community's own timezone is applied inside the scheduler
export const reportTickJob: ScheduledJob = {
  name: "LeaderboardReportTick",
  cron: "0 * * * * *",
  execute: async (now) => {
    const { scheduler } = getServices();
    await scheduler.tick(now instanceof Date ? now : new Date());
  },
}
