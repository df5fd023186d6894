import { describe, expect, it } from "vitest";
import {
  SerialQueue,
  extractHandles,
  formatHandle,
  mentionChannel,
  mentionUser,
  normalizeHandle,
  positiveIntOr,
} from "../src/helpers";
import { addToTally, rankTally, type Tally } from "../src/models/tally";

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe("handles", () => {
  it("normalizes and formats handles", () => {
    expect(normalizeHandle("  @@Some.User ")).toBe("Some.User");
    expect(normalizeHandle("plain")).toBe("plain");
    expect(formatHandle("@x_y")).toBe("@x_y");
    expect(formatHandle("x_y")).toBe("@x_y");
  });

  it("extracts handles from mentions and profile links", () => {
    expect(extractHandles("Follow @Alpha_1 and https://www.tiktok.com/@beta.two, also @Alpha_1 again")).toEqual([
      "Alpha_1",
      "beta.two",
    ]);
  });

  it("ignores chat mentions, email addresses and one-letter handles", () => {
    expect(extractHandles("<@123456> mail me@example.com or ping @a")).toEqual([]);
  });

  it("formats chat mentions", () => {
    expect(mentionUser("42")).toBe("<@42>");
    expect(mentionChannel("7")).toBe("<#7>");
  });
});

describe("positiveIntOr", () => {
  it("keeps positive integers and falls back otherwise", () => {
    expect(positiveIntOr(3, 1)).toBe(3);
    expect(positiveIntOr(undefined, 7)).toBe(7);
    expect(positiveIntOr(0, 1)).toBe(1);
    expect(positiveIntOr(2.5, 1)).toBe(1);
    expect(positiveIntOr(Number.NaN, 1)).toBe(1);
  });
});

describe("rankTally", () => {
  it("orders by score and keeps first-seen order for ties", () => {
    const tally: Tally = new Map();
    addToTally(tally, "b", 2);
    addToTally(tally, "a", 5);
    addToTally(tally, "c", 2);
    addToTally(tally, "b", 1);
    addToTally(tally, "d", 2);

    expect(rankTally(tally)).toEqual([
      { handle: "a", score: 5 },
      { handle: "b", score: 3 },
      { handle: "c", score: 2 },
      { handle: "d", score: 2 },
    ]);
  });
});

describe("SerialQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const log: string[] = [];
    const task = (name: string, ms: number) => async () => {
      log.push(`start ${name}`);
      await sleep(ms);
      log.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.enqueue(task("slow", 20)), queue.enqueue(task("fast", 1))]);

    expect(results).toEqual(["slow", "fast"]);
    expect(log).toEqual(["start slow", "end slow", "start fast", "end fast"]);
  });

  it("keeps going after a task fails", async () => {
    const queue = new SerialQueue();
    const failing = queue.enqueue(async () => {
      throw new Error("boom");
    });
    const next = queue.enqueue(async () => "still runs");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("still runs");
  });

  it("drains everything queued so far", async () => {
    const queue = new SerialQueue();
    const done: number[] = [];
    void queue.enqueue(async () => {
      await sleep(5);
      done.push(1);
    });
    void queue.enqueue(async () => {
      done.push(2);
    });

    await queue.drain();
    expect(done).toEqual([1, 2]);
  });
});
