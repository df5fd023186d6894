import { describe, expect, it, vi } from "vitest";
import { Collection } from "discord.js";
import { buildSchedulePatch, describeSchedule } from "../src/slash/set_schedule";
import { collectHandleLinks, fetchRecent, type PagedMessage } from "../src/slash/backscan";
import { sampleBoard } from "../src/slash/cc_test_image";
import { buildHelp } from "../src/slash/help";
import { tokconnect } from "../src/slash/tokconnect";
import { leaderboard } from "../src/slash/leaderboard";
import { ConfigurationError } from "../src/errors";
import { DEFAULT_SCHEDULE } from "../src/models/community_config";

describe("set_schedule", () => {
  it("builds a patch from the options that were given", () => {
    expect(buildSchedulePatch({ timezone: " America/Chicago ", weeklyDay: 3, weeklyHour: null, monthlyMinute: 0 })).toEqual({
      timezone: "America/Chicago",
      weeklyDay: 3,
      monthlyMinute: 0,
    });
    expect(buildSchedulePatch({})).toEqual({});
  });

  it("rejects unknown timezones", () => {
    let error: unknown;
    try {
      buildSchedulePatch({ timezone: "Mars/Olympus" });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: "INVALID_TIMEZONE" });
  });

  it("rejects out of range values", () => {
    expect(() => buildSchedulePatch({ weeklyDay: 8 })).toThrow("❌ weekday must be between 1 and 7.");
    expect(() => buildSchedulePatch({ weeklyHour: 24 })).toThrow("❌ hour must be between 0 and 23.");
    expect(() => buildSchedulePatch({ monthlyMinute: 60 })).toThrow("❌ monthly_minute must be between 0 and 59.");
  });

  it("describes the schedule", () => {
    const text = describeSchedule({
      communityId: "g1",
      sourceHandle: null,
      reportChannelId: null,
      timezone: "America/Chicago",
      ...DEFAULT_SCHEDULE,
      monthlyMinute: 5,
    });
    expect(text).toBe("🗓️ Weekly: Saturday 19:00 • Monthly: day 1 19:05 • Timezone: America/Chicago");
  });
});

describe("backscan", () => {
  it("links handles to the last human who mentioned them", () => {
    const links = collectHandleLinks([
      { authorId: "a", isBot: false, content: "my tiktok is @alpha and tiktok.com/@beta" },
      { authorId: "bot", isBot: true, content: "@gamma" },
      { authorId: "b", isBot: false, content: "actually @alpha is me" },
      { authorId: "c", isBot: false, content: "<@123> hi" },
    ]);
    expect(Array.from(links)).toEqual([
      ["alpha", "b"],
      ["beta", "a"],
    ]);
  });
});

describe("backscan paging", () => {
  // 250 messages, ids "m1" (oldest) to "m250"; pages come newest first
  const history: PagedMessage[] = Array.from({ length: 250 }, (_, i) => ({ id: `m${i + 1}`, createdTimestamp: 1000 + i }));
  const fetchPage = vi.fn(async (limit: number, before?: string) => {
    const end = before ? history.findIndex(m => m.id === before) : history.length;
    const page = history.slice(Math.max(0, end - limit), end).reverse();
    return new Collection(page.map((m): [string, PagedMessage] => [m.id, m]));
  });

  it("pages back from the newest message and returns them oldest first", async () => {
    fetchPage.mockClear();
    const messages = await fetchRecent(fetchPage, 150);

    expect(fetchPage.mock.calls).toEqual([[100, undefined], [50, "m151"]]);
    expect(messages).toHaveLength(150);
    expect(messages[0].id).toBe("m101");
    expect(messages[149].id).toBe("m250");
  });

  it("stops when the history runs out", async () => {
    fetchPage.mockClear();
    const messages = await fetchRecent(fetchPage, 2000);

    expect(messages).toHaveLength(250);
    expect(messages[0].id).toBe("m1");
    expect(fetchPage).toHaveBeenCalledTimes(4);
  });
});

describe("cc_test_image", () => {
  it("fills both columns with sample rows", () => {
    const { left, right } = sampleBoard();
    expect(left).toHaveLength(10);
    expect(left[0]).toEqual({ name: "userGifter1", score: 100 });
    expect(right[9]).toEqual({ name: "userTapper10", score: 2500 });
  });
});

describe("help", () => {
  const commands = [tokconnect, leaderboard];

  it("lists commands by name with their descriptions", () => {
    expect(buildHelp(commands)).toBe(
      [
        "**Commands**",
        "• /leaderboard — Post the gifter/tapper board for the last few days in this channel",
        "• /tokconnect — Link your TikTok username to your Discord",
        "Use `/help command:<name>` for details.",
      ].join("\n")
    );
  });

  it("shows a command's help text", () => {
    expect(buildHelp(commands, "/tokconnect")).toBe(
      [
        "```",
        "Command: tokconnect",
        "Description: Links your TikTok username to your Discord account so the board shows your name and gifts earn you XP.",
        "Examples:",
        "  - Input: /tokconnect username:some.viewer",
        "    Output: 🔗 Linked @some.viewer → @you",
        "```",
      ].join("\n")
    );
  });

  it("falls back to the description and rejects unknown names", () => {
    expect(buildHelp(commands, "leaderboard")).toBe(
      "/leaderboard: Post the gifter/tapper board for the last few days in this channel"
    );
    expect(buildHelp(commands, "nope")).toBe("❌ Unknown command `/nope`.");
  });
});
