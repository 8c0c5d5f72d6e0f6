import { AppError } from "../errors";
import { BidderId } from "../../domain/entities/auction";
import { shouldExtendAuction, extendAuction } from "../../domain/services/antiSniping";
import { formatAmount, parseBid } from "../../domain/services/currency";
import { findHighestBid } from "../../domain/services/ranking";
import { AuctionRegistry } from "../ports/repositories";
import { AuctionLock, Notifier } from "../ports/services";
import { dispatchNotifications, Notification, resolveMemberOrNull } from "../notifications";
import { log } from "../../infrastructure/logging/logger";

export type PlaceBidInput = {
  channelId: string;
  bidderId: BidderId;
  bidText: string;
};

export type PlaceBidResult = {
  channelId: string;
  bidderId: BidderId;
  amount: number;
  display: string;
  isHighest: boolean;
  extended: boolean;
  endTime: Date;
};

type AcceptedBid = PlaceBidResult & {
  item: string;
  displacedBidderId: BidderId | null;
  otherBids: Array<[BidderId, number]>;
};

export class PlaceBidUseCase {
  constructor(
    private readonly registry: AuctionRegistry,
    private readonly lock: AuctionLock,
    private readonly notifier: Notifier,
    private readonly thresholdMs: number,
    private readonly extensionMs: number,
    private readonly lockTimeoutMs: number
  ) {}

  async execute(input: PlaceBidInput): Promise<PlaceBidResult> {
    const accepted = await this.lock.withLock(`auction:${input.channelId}`, this.lockTimeoutMs, () =>
      this.accept(input)
    );

    log("info", "bid.accepted", {
      channelId: accepted.channelId,
      bidderId: accepted.bidderId,
      extended: accepted.extended
    });

    await dispatchNotifications(this.notifier, await this.buildNotifications(accepted));

    return {
      channelId: accepted.channelId,
      bidderId: accepted.bidderId,
      amount: accepted.amount,
      display: accepted.display,
      isHighest: accepted.isHighest,
      extended: accepted.extended,
      endTime: accepted.endTime
    };
  }

  private async accept(input: PlaceBidInput): Promise<AcceptedBid> {
    const auction = await this.registry.findByChannel(input.channelId);
    if (!auction) {
      throw new AppError("No active auction in this channel", 404, "NO_ACTIVE_AUCTION");
    }

    const now = new Date();
    if (now.getTime() >= auction.endTime.getTime()) {
      throw new AppError("This auction has ended", 409, "AUCTION_ENDED");
    }

    const parsed = parseBid(input.bidText);
    if (!parsed.ok) {
      throw new AppError(
        "Invalid bid format. Use tiers from highest to lowest, e.g. 1m 50p 100g 500s",
        400,
        "INVALID_BID_FORMAT"
      );
    }

    const ownBid = auction.bids.get(input.bidderId) ?? 0;
    if (parsed.amount <= ownBid) {
      throw new AppError("Your new bid must be higher than your previous bid", 409, "BID_NOT_HIGHER_THAN_OWN");
    }

    const highest = findHighestBid(auction.bids);
    if (highest && parsed.amount <= highest.amount) {
      throw new AppError("Your bid must be higher than the current highest bid", 409, "BID_NOT_HIGHEST_OVERALL");
    }

    const displacedBidderId = highest && highest.bidderId !== input.bidderId ? highest.bidderId : null;
    const extended =
      displacedBidderId !== null && shouldExtendAuction(auction.endTime, now, this.thresholdMs);
    const endTime = extended ? extendAuction(auction.endTime, now, this.extensionMs) : auction.endTime;

    const bids = new Map(auction.bids);
    bids.set(input.bidderId, parsed.amount);
    await this.registry.update(input.channelId, { bids, endTime });

    if (extended) {
      log("info", "auction.extended", {
        channelId: input.channelId,
        endTime: endTime.toISOString()
      });
    }

    return {
      channelId: input.channelId,
      bidderId: input.bidderId,
      item: auction.item,
      amount: parsed.amount,
      display: parsed.display,
      isHighest: true,
      extended,
      endTime,
      displacedBidderId,
      otherBids: [...bids.entries()].filter(([bidderId]) => bidderId !== input.bidderId)
    };
  }

  private async buildNotifications(accepted: AcceptedBid): Promise<Notification[]> {
    const { channelId, item } = accepted;
    const notifications: Notification[] = [];

    if (accepted.extended && accepted.displacedBidderId) {
      const displaced = await resolveMemberOrNull(this.notifier, channelId, accepted.displacedBidderId);
      if (displaced) {
        notifications.push({
          target: { kind: "user", channelId, userId: displaced.userId },
          event: { type: "auction:extended", item, endTime: accepted.endTime }
        });
      }
      notifications.push(
        {
          target: { kind: "user", channelId, userId: accepted.bidderId },
          event: { type: "auction:extended", item, endTime: accepted.endTime }
        },
        {
          target: { kind: "channel", channelId },
          event: { type: "auction:extended-notice", item, endTime: accepted.endTime }
        }
      );
    }

    notifications.push({
      target: { kind: "user", channelId, userId: accepted.bidderId },
      event: {
        type: "bid:accepted",
        item,
        displayAmount: accepted.display,
        isHighest: accepted.isHighest
      }
    });

    // Every other bidder hears about each new high bid, not only the one displaced.
    const outbid = await Promise.all(
      accepted.otherBids.map(async ([bidderId, amount]) => {
        const member = await resolveMemberOrNull(this.notifier, channelId, bidderId);
        return member ? { member, amount } : null;
      })
    );
    for (const entry of outbid) {
      if (entry) {
        notifications.push({
          target: { kind: "user", channelId, userId: entry.member.userId },
          event: { type: "bid:outbid", item, displayAmount: formatAmount(entry.amount) }
        });
      }
    }

    return notifications;
  }
}
