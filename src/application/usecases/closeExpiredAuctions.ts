import { Auction } from "../../domain/entities/auction";
import { AuctionRegistry } from "../ports/repositories";
import { AuctionLock } from "../ports/services";
import { SettleAuctionUseCase, SettlementOutcome } from "./settleAuction";
import { logError } from "../../infrastructure/logging/logger";

/**
 * One pass of the expiry scan. Candidates come from an unlocked snapshot;
 * each is re-read and removed under its channel lock before settlement, so
 * overlapping passes settle an auction at most once.
 */
export class CloseExpiredAuctionsUseCase {
  constructor(
    private readonly registry: AuctionRegistry,
    private readonly lock: AuctionLock,
    private readonly settleAuction: SettleAuctionUseCase,
    private readonly lockTimeoutMs: number
  ) {}

  async execute(): Promise<SettlementOutcome[]> {
    const now = new Date();
    const candidates = (await this.registry.listActive()).filter(
      (auction) => auction.endTime.getTime() <= now.getTime()
    );

    const claimed = await Promise.all(candidates.map((auction) => this.claim(auction.channelId)));
    const closed = claimed.filter((auction): auction is Auction => auction !== null);

    const outcomes = await Promise.all(closed.map((auction) => this.settle(auction)));
    return outcomes.filter((outcome): outcome is SettlementOutcome => outcome !== null);
  }

  private async claim(channelId: string): Promise<Auction | null> {
    try {
      return await this.lock.withLock(`auction:${channelId}`, this.lockTimeoutMs, async () => {
        const current = await this.registry.findByChannel(channelId);
        // Gone, or pushed past the deadline by a bid since the snapshot.
        if (!current || current.endTime.getTime() > Date.now()) {
          return null;
        }
        return this.registry.removeIfPresent(channelId);
      });
    } catch (error) {
      // Left in the registry; the next pass retries the claim.
      logError("auction.claim_failed", error, { channelId });
      return null;
    }
  }

  private async settle(auction: Auction): Promise<SettlementOutcome | null> {
    try {
      return await this.settleAuction.execute(auction);
    } catch (error) {
      logError("auction.settle_failed", error, { channelId: auction.channelId });
      return null;
    }
  }
}
