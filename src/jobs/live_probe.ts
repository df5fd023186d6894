import ScheduledJob from "../models/scheduled_job";
import { getServices } from "../container";
import { createLiveProbe } from "../sources/live_probe";

export const liveProbeJob: ScheduledJob = {
  name: "LiveProbe",
  cron: "0 */5 * * * *",
  runOnInit: true,
  execute: async () => {
    const { tracking, log, config } = getServices();
    const started = await tracking.autoStart(createLiveProbe(log, config.liveProbeTimeoutMs));
    if (started.length) {
      log.info(`Auto-started tracking for ${started.join(", ")}`);
    }
  },
}
