import { AppError } from "../errors";
import { Auction } from "../../domain/entities/auction";
import { parseDuration } from "../../domain/services/duration";
import { AuctionRegistry } from "../ports/repositories";
import { AuctionLock, AuctionRules, Notifier } from "../ports/services";
import { dispatchNotifications } from "../notifications";
import { log } from "../../infrastructure/logging/logger";

export type StartAuctionInput = {
  channelId: string;
  item: string;
  durationText: string;
};

export class StartAuctionUseCase {
  constructor(
    private readonly registry: AuctionRegistry,
    private readonly lock: AuctionLock,
    private readonly notifier: Notifier,
    private readonly rules: AuctionRules,
    private readonly lockTimeoutMs: number
  ) {}

  async execute(input: StartAuctionInput): Promise<Auction> {
    const auction = await this.lock.withLock(`auction:${input.channelId}`, this.lockTimeoutMs, async () => {
      if (await this.registry.findByChannel(input.channelId)) {
        throw new AppError("An auction is already running in this channel", 409, "AUCTION_ALREADY_ACTIVE");
      }

      const duration = parseDuration(input.durationText);
      if (!duration.ok) {
        throw new AppError(
          "Invalid duration format. Use 5m for 5 minutes or 2h for 2 hours",
          400,
          "INVALID_DURATION_FORMAT"
        );
      }

      const startTime = new Date();
      const endTime = new Date(startTime.getTime() + Math.max(duration.ms, this.rules.minimumDurationMs));
      // Past the last representable Date; such an auction could never close.
      if (Number.isNaN(endTime.getTime())) {
        throw new AppError("Duration is too long", 400, "INVALID_DURATION_FORMAT");
      }
      const created: Auction = {
        channelId: input.channelId,
        item: input.item,
        durationText: input.durationText,
        startTime,
        endTime,
        bids: new Map()
      };
      if (!(await this.registry.insertIfAbsent(created))) {
        throw new AppError("An auction is already running in this channel", 409, "AUCTION_ALREADY_ACTIVE");
      }
      return created;
    });

    log("info", "auction.started", {
      channelId: auction.channelId,
      item: auction.item,
      endTime: auction.endTime.toISOString()
    });

    await dispatchNotifications(this.notifier, [
      {
        target: { kind: "channel", channelId: auction.channelId },
        event: {
          type: "auction:started",
          item: auction.item,
          durationText: auction.durationText,
          endTime: auction.endTime,
          rules: this.rules
        }
      }
    ]);

    return auction;
  }
}
