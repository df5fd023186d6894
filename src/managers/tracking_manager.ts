import type { Logger } from "winston";
import type { LeaderboardStore } from "../db/store";
import type { LiveEvent, LiveEventSource, LiveEventSourceFactory } from "../models/live_event";
import { ConfigurationError } from "../errors";
import { normalizeHandle } from "../helpers";
import type LiveAggregator from "./live_aggregator";
import type { LiveProbe } from "../sources/live_probe";

/**
 * Owns the one live-stream connection each community may have and feeds its
 * events to the aggregator. Once a connection is torn down nothing it emits
 * afterwards is dispatched.
 */
export default class TrackingManager {
  log: Logger;
  private connections = new Map<string, LiveEventSource>();

  constructor(
    logger: Logger,
    private store: LeaderboardStore,
    private aggregator: LiveAggregator,
    private createSource: LiveEventSourceFactory
  ) {
    this.log = logger;
  }

  isTracking(communityId: string) {
    return this.connections.has(communityId);
  }

  async start(communityId: string): Promise<string> {
    const cfg = await this.store.getCommunityConfig(communityId);
    const handle = normalizeHandle(cfg?.sourceHandle ?? "");
    if (!handle) {
      throw new ConfigurationError("❌ No TikTok username set. Use `/toktrack <username>` first.", "MISSING_SOURCE_HANDLE");
    }
    if (!cfg?.reportChannelId) {
      throw new ConfigurationError("❌ No target channel set. Use `/set_target_channel #channel` first.", "MISSING_REPORT_CHANNEL");
    }

    this.stop(communityId);
    const source = this.createSource(handle);
    this.connections.set(communityId, source);
    try {
      await source.connect(
        event => this.onEvent(communityId, source, event),
        () => this.onConnectionLost(communityId, source)
      );
    } catch (err) {
      this.release(communityId, source);
      throw err;
    }
    this.log.info(`Tracking @${handle} for ${communityId}`);
    return handle;
  }

  stop(communityId: string): boolean {
    const source = this.connections.get(communityId);
    if (!source) return false;
    this.release(communityId, source);
    this.log.info(`Stopped tracking @${source.hostHandle} for ${communityId}`);
    return true;
  }

  stopAll() {
    for (const communityId of Array.from(this.connections.keys())) {
      this.stop(communityId);
    }
  }

  /**
   * Starts tracking every configured community that is not tracked yet and
   * whose host the probe reports as live.
   */
  async autoStart(probe: LiveProbe): Promise<string[]> {
    const started: string[] = [];
    for (const cfg of await this.store.listCommunityConfigs()) {
      if (!cfg.sourceHandle || !cfg.reportChannelId || this.isTracking(cfg.communityId)) continue;
      if (!(await probe(cfg.sourceHandle))) continue;
      // Someone may have started tracking while the probe was out
      if (this.isTracking(cfg.communityId)) continue;
      try {
        await this.start(cfg.communityId);
        started.push(cfg.communityId);
      } catch (err) {
        this.log.error(`Auto-start failed for ${cfg.communityId}`, err);
      }
    }
    return started;
  }

  private onEvent(communityId: string, source: LiveEventSource, event: LiveEvent) {
    if (this.connections.get(communityId) !== source) return;

    // dispatch never rejects
    void this.aggregator.dispatch(communityId, event).then(() => {
      if (event.kind === "session-end") this.release(communityId, source);
    });
  }

  /**
   * The connection dropped without an end-of-stream. The open session is left
   * as it is; the next live probe can reconnect the community.
   */
  private onConnectionLost(communityId: string, source: LiveEventSource) {
    if (this.connections.get(communityId) !== source) return;
    this.log.warn(`Lost connection to @${source.hostHandle} for ${communityId}`);
    this.release(communityId, source);
  }

  private release(communityId: string, source: LiveEventSource) {
    if (this.connections.get(communityId) === source) {
      this.connections.delete(communityId);
    }
    try {
      source.disconnect();
    } catch (err) {
      this.log.warn(`Disconnect from @${source.hostHandle} failed`, err);
    }
  }
}
