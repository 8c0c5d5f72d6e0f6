export interface AuctionLock {
  withLock<T>(resource: string, timeoutMs: number, handler: () => Promise<T>): Promise<T>;
}

export interface ExpiryScheduler {
  start(): void;
  stop(): Promise<void>;
}

export type NotificationTarget =
  | { kind: "channel"; channelId: string }
  | { kind: "user"; channelId: string; userId: string }
  | { kind: "results" };

export type MemberContact = {
  userId: string;
  displayName: string;
};

export type AuctionRules = {
  minimumDurationMs: number;
  antiSnipingThresholdMs: number;
  antiSnipingExtensionMs: number;
};

export type AuctionEvent =
  | { type: "auction:started"; item: string; durationText: string; endTime: Date; rules: AuctionRules }
  | { type: "auction:extended"; item: string; endTime: Date }
  | { type: "auction:extended-notice"; item: string; endTime: Date }
  | { type: "bid:accepted"; item: string; displayAmount: string; isHighest: boolean }
  | { type: "bid:outbid"; item: string; displayAmount: string }
  | { type: "auction:no-bids"; item: string }
  | { type: "auction:winner"; item: string; winnerName: string; displayAmount?: string }
  | { type: "auction:congratulations"; item: string; displayAmount: string };

export interface Notifier {
  notify(target: NotificationTarget, event: AuctionEvent): Promise<void>;
  resolveMember(channelId: string, userId: string): Promise<MemberContact | null>;
}
