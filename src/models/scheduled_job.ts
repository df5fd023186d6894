type ScheduledJob = {
  name: string
  cron: string
  execute: (now?: Date | "manual" | "init") => void | Promise<void>
  timezone?: string
  // run once as soon as the job is registered
  runOnInit?: boolean
}

export default ScheduledJob
