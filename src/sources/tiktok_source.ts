import { WebcastPushConnection } from "tiktok-live-connector";
import { z } from "zod";
import type { Logger } from "winston";
import type { ConnectionLostListener, LiveEventListener, LiveEventSource } from "../models/live_event";

const userSchema = z.object({ uniqueId: z.string().min(1) });

const giftSchema = userSchema.extend({
  repeatCount: z.coerce.number().optional(),
  diamondCount: z.coerce.number().optional(),
  giftType: z.number().optional(),
  repeatEnd: z.union([z.boolean(), z.number()]).optional(),
});

const likeSchema = userSchema.extend({
  likeCount: z.coerce.number().optional(),
});

/**
 * Adapts a TikTok LIVE connection to LiveEvent. Streakable gifts (giftType 1)
 * report a running repeat count; only the final event of a streak is passed on.
 */
export default class TikTokLiveSource implements LiveEventSource {
  private connection: WebcastPushConnection;
  private listener?: LiveEventListener;
  private onConnectionLost?: ConnectionLostListener;

  constructor(public readonly hostHandle: string, private log: Logger, sessionId?: string) {
    this.connection = new WebcastPushConnection(hostHandle, sessionId ? { sessionId } : {});
  }

  async connect(listener: LiveEventListener, onConnectionLost: ConnectionLostListener) {
    this.listener = listener;
    this.onConnectionLost = onConnectionLost;

    this.connection.on("gift", (data: unknown) => {
      const gift = giftSchema.safeParse(data);
      if (!gift.success) return this.drop("gift", gift.error);
      if (gift.data.giftType === 1 && !gift.data.repeatEnd) return;
      this.emit({
        kind: "gift",
        performerHandle: gift.data.uniqueId,
        repeatCount: gift.data.repeatCount,
        diamondValue: gift.data.diamondCount,
      });
    });

    this.connection.on("like", (data: unknown) => {
      const like = likeSchema.safeParse(data);
      if (!like.success) return this.drop("like", like.error);
      this.emit({ kind: "like", performerHandle: like.data.uniqueId, likeCount: like.data.likeCount });
    });

    this.connection.on("chat", (data: unknown) => {
      const chat = userSchema.safeParse(data);
      if (!chat.success) return this.drop("chat", chat.error);
      this.emit({ kind: "comment", performerHandle: chat.data.uniqueId });
    });

    this.connection.on("streamEnd", () => {
      this.onConnectionLost = undefined;
      this.emit({ kind: "session-end" });
    });

    this.connection.on("disconnected", () => {
      const lost = this.onConnectionLost;
      if (!lost) return;
      this.onConnectionLost = undefined;
      this.log.warn(`TikTok LIVE connection for @${this.hostHandle} dropped`);
      lost();
    });

    await this.connection.connect();
    this.log.info(`Connected to TikTok LIVE for @${this.hostHandle}`);
    this.emit({ kind: "session-start", hostHandle: this.hostHandle });
  }

  disconnect() {
    this.listener = undefined;
    this.onConnectionLost = undefined;
    this.connection.disconnect();
  }

  private emit(event: Parameters<LiveEventListener>[0]) {
    this.listener?.(event);
  }

  private drop(eventName: string, error: z.ZodError) {
    this.log.debug(`Ignoring malformed ${eventName} event from @${this.hostHandle}: ${error.message}`);
  }
}
