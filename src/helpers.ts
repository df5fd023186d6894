export function mentionUser(userId: string) {
  return `<@${userId}>`;
}

export function mentionChannel(channelId: string) {
  return `<#${channelId}>`;
}

// "  @Some.User " -> "Some.User"
export function normalizeHandle(handle: string): string {
  return handle.trim().replace(/^@+/, "");
}

export function formatHandle(handle: string): string {
  return `@${normalizeHandle(handle)}`;
}

const HANDLE_PATTERN = /(?:tiktok\.com\/@|(?<![<\w])@)([A-Za-z0-9._-]{2,24})/g;

/**
 * Pulls TikTok handles out of free text, either as profile links or as
 * "@handle" mentions. Discord mentions (<@123>) are not matched. Results are
 * unique and in order of appearance.
 */
export function extractHandles(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(HANDLE_PATTERN)) {
    const handle = normalizeHandle(match[1]);
    if (handle) found.add(handle);
  }
  return Array.from(found);
}

export function positiveIntOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : fallback;
}

export async function asyncForEach<T>(items: Iterable<T>, fn: (item: T) => Promise<void>) {
  for (const item of items) {
    await fn(item);
  }
}

/**
 * Runs tasks one at a time in submission order. A failing task rejects its
 * own promise but does not stop the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.catch(() => undefined);
    return run;
  }

  // Resolves once everything queued so far has settled
  async drain(): Promise<void> {
    let current: Promise<unknown>;
    do {
      current = this.tail;
      await current;
    } while (current !== this.tail);
  }
}
