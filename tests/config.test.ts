import { describe, expect, it } from "vitest";
import { parseConfig } from "../src/config";

describe("parseConfig", () => {
  it("applies defaults", () => {
    const cfg = parseConfig({});
    expect(cfg.botToken).toBeUndefined();
    expect(cfg.logLevel).toBe("info");
    expect(cfg.defaultTimezone).toBe("Etc/UTC");
    expect(cfg.port).toBe(8080);
    expect(cfg.xpPerGift).toBe(10);
    expect(cfg.liveProbeTimeoutMs).toBe(8000);
    expect(cfg.assetsDir).toBe("assets");
  });

  it("reads values from the environment", () => {
    const cfg = parseConfig({
      DISCORD_BOT_TOKEN: "test-secret",
      PORT: "3000",
      XP_PER_GIFT: "25",
      LOG_LEVEL: "debug",
      DEFAULT_TIMEZONE: "Europe/Berlin",
    });
    expect(cfg.botToken).toBe("test-secret");
    expect(cfg.port).toBe(3000);
    expect(cfg.xpPerGift).toBe(25);
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.defaultTimezone).toBe("Europe/Berlin");
  });

  it("treats blank numbers as unset", () => {
    expect(parseConfig({ PORT: " " }).port).toBe(8080);
  });

  it("rejects malformed values", () => {
    expect(() => parseConfig({ PORT: "eighty" })).toThrow();
    expect(() => parseConfig({ XP_PER_GIFT: "-5" })).toThrow();
    expect(() => parseConfig({ LOG_LEVEL: "loud" })).toThrow();
  });
});
