import { Auction, BidderId } from "../../domain/entities/auction";
import { formatAmount } from "../../domain/services/currency";
import { findHighestBid } from "../../domain/services/ranking";
import { Notifier } from "../ports/services";
import { dispatchNotifications, Notification, resolveMemberOrNull } from "../notifications";
import { log } from "../../infrastructure/logging/logger";

export type SettlementOutcome =
  | { kind: "no-bids"; channelId: string; item: string }
  | {
      kind: "winner";
      channelId: string;
      item: string;
      winnerId: BidderId;
      winnerName: string;
      amount: number;
      display: string;
      congratulated: boolean;
    };

export class SettleAuctionUseCase {
  constructor(private readonly notifier: Notifier) {}

  async execute(auction: Auction): Promise<SettlementOutcome> {
    const { channelId, item } = auction;
    const highest = findHighestBid(auction.bids);

    if (!highest) {
      log("info", "auction.settled", { channelId, outcome: "no-bids" });
      await dispatchNotifications(this.notifier, [
        { target: { kind: "channel", channelId }, event: { type: "auction:no-bids", item } },
        { target: { kind: "results" }, event: { type: "auction:no-bids", item } }
      ]);
      return { kind: "no-bids", channelId, item };
    }

    const display = formatAmount(highest.amount);
    // An unresolvable winner is still announced, by id, but gets no private message.
    const winner = await resolveMemberOrNull(this.notifier, channelId, highest.bidderId);
    const winnerName = winner?.displayName ?? highest.bidderId;

    const notifications: Notification[] = [
      {
        target: { kind: "channel", channelId },
        event: { type: "auction:winner", item, winnerName }
      },
      {
        target: { kind: "results" },
        event: { type: "auction:winner", item, winnerName, displayAmount: display }
      }
    ];
    if (winner) {
      notifications.push({
        target: { kind: "user", channelId, userId: winner.userId },
        event: { type: "auction:congratulations", item, displayAmount: display }
      });
    }

    log("info", "auction.settled", { channelId, outcome: "winner", winnerId: highest.bidderId });
    await dispatchNotifications(this.notifier, notifications);

    return {
      kind: "winner",
      channelId,
      item,
      winnerId: highest.bidderId,
      winnerName,
      amount: highest.amount,
      display,
      congratulated: winner !== null
    };
  }
}
