import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === "" ? fallback : Number(val)))
    .pipe(z.number().int().nonnegative());

const configSchema = z.object({
  botToken: z.string().optional(),
  databaseUrl: z.string().optional(),
  sentryDsn: z.string().optional(),
  logLevel: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
  defaultTimezone: z.string().default("Etc/UTC"),
  port: intFromEnv(8080),
  xpPerGift: intFromEnv(10),
  liveProbeTimeoutMs: intFromEnv(8000),
  tiktokSessionId: z.string().optional(),
  assetsDir: z.string().default("assets"),
  backgroundImage: z.string().optional(),
  connectPromptText: z
    .string()
    .default(
      "🔗 Connect your TikTok to your Discord so you can appear on the board and earn roles!\n" +
        "Use: `/tokconnect your_tiktok_name` (no @)"
    ),
});

export type BotConfig = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): BotConfig {
  return configSchema.parse({
    botToken: env.DISCORD_BOT_TOKEN,
    databaseUrl: env.DATABASE_URL,
    sentryDsn: env.SENTRY_DSN,
    logLevel: env.LOG_LEVEL,
    defaultTimezone: env.DEFAULT_TIMEZONE,
    port: env.PORT,
    xpPerGift: env.XP_PER_GIFT,
    liveProbeTimeoutMs: env.LIVE_PROBE_TIMEOUT_MS,
    tiktokSessionId: env.TIKTOK_SESSIONID,
    assetsDir: env.ASSETS_DIR,
    backgroundImage: env.BACKGROUND_IMAGE,
    connectPromptText: env.CONNECT_PROMPT_TEXT,
  });
}

export const config = parseConfig(process.env);

// Single-holder roles
export const TOP_GIFTER_ROLE = "Top Gifter";
export const SORE_FINGER_ROLE = "Sore Finger";

export const LINK_REMINDER_TEXT =
  "🔗 Reminder: Link your TikTok with `/tokconnect your_tiktok_name` so we can match your Discord and rank you on the board!";
