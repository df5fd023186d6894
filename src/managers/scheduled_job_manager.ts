import { CronJob } from "cron";
import type { Logger } from "winston";
import ScheduledJob from "../models/scheduled_job";

export default class ScheduledJobManager {
  jobs: { [name: string]: CronJob } = {};
  log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  registerJob(job: ScheduledJob) {
    if (this.jobs[job.name]) {
      this.log.warn(`Job ${job.name} is already registered, replacing it`);
      this.jobs[job.name].stop();
    }

    this.jobs[job.name] = CronJob.from({
      cronTime: job.cron,
      timeZone: job.timezone,
      start: true,
      onTick: async () => {
        try {
          await job.execute(new Date());
        } catch (err) {
          this.log.error(`Scheduled job ${job.name} failed`, err);
        }
      },
    });
    this.log.info(`Registered job ${job.name} (${job.cron}${job.timezone ? ` ${job.timezone}` : ""})`);

    if (job.runOnInit) {
      Promise.resolve(job.execute("init")).catch(err => this.log.error(`Initial run of ${job.name} failed`, err));
    }
  }

  stopAll() {
    Object.values(this.jobs).forEach(j => j.stop());
  }
}
