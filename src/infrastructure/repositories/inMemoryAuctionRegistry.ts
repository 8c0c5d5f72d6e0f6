import { Auction } from "../../domain/entities/auction";
import { AuctionRegistry, AuctionUpdate } from "../../application/ports/repositories";

function copyAuction(auction: Auction): Auction {
  return {
    ...auction,
    startTime: new Date(auction.startTime.getTime()),
    endTime: new Date(auction.endTime.getTime()),
    bids: new Map(auction.bids)
  };
}

// Process-lifetime only; auctions do not survive a restart.
export class InMemoryAuctionRegistry implements AuctionRegistry {
  private readonly auctions = new Map<string, Auction>();

  async findByChannel(channelId: string): Promise<Auction | null> {
    const auction = this.auctions.get(channelId);
    return auction ? copyAuction(auction) : null;
  }

  async listActive(): Promise<Auction[]> {
    return [...this.auctions.values()].map(copyAuction);
  }

  async insertIfAbsent(auction: Auction): Promise<boolean> {
    if (this.auctions.has(auction.channelId)) {
      return false;
    }
    this.auctions.set(auction.channelId, copyAuction(auction));
    return true;
  }

  async update(channelId: string, update: AuctionUpdate): Promise<void> {
    const auction = this.auctions.get(channelId);
    if (!auction) {
      return;
    }
    const next = copyAuction({ ...auction, ...update });
    // Deadlines only move forward.
    if (next.endTime.getTime() < auction.endTime.getTime()) {
      next.endTime = new Date(auction.endTime.getTime());
    }
    this.auctions.set(channelId, next);
  }

  async removeIfPresent(channelId: string): Promise<Auction | null> {
    const auction = this.auctions.get(channelId);
    if (!auction) {
      return null;
    }
    this.auctions.delete(channelId);
    return auction;
  }
}
