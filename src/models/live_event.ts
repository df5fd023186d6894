/**
 * Events emitted by a live-stream source for one community.
 * Every source adapter maps its own callbacks onto this union and hands them
 * to a single dispatch function.
 */
export type LiveEvent =
  | { kind: "session-start"; hostHandle: string }
  | { kind: "gift"; performerHandle: string; repeatCount?: number; diamondValue?: number }
  | { kind: "like"; performerHandle: string; likeCount?: number }
  | { kind: "comment"; performerHandle: string }
  | { kind: "session-end" };

export type LiveEventListener = (event: LiveEvent) => void;

// Called when the connection drops without the stream ending
export type ConnectionLostListener = () => void;

export interface LiveEventSource {
  readonly hostHandle: string;
  connect(listener: LiveEventListener, onConnectionLost: ConnectionLostListener): Promise<void>;
  disconnect(): void;
}

export type LiveEventSourceFactory = (hostHandle: string) => LiveEventSource;
