import { Auction } from "../../domain/entities/auction";

export type AuctionUpdate = Partial<Pick<Auction, "endTime" | "bids">>;

/**
 * Keyed store of active auctions, one per channel. Reads hand out copies;
 * callers change state only through the write methods below.
 */
export interface AuctionRegistry {
  findByChannel(channelId: string): Promise<Auction | null>;
  listActive(): Promise<Auction[]>;
  /** Returns false when the channel already hosts an auction. */
  insertIfAbsent(auction: Auction): Promise<boolean>;
  update(channelId: string, update: AuctionUpdate): Promise<void>;
  /** Returns the removed auction, or null when it was already gone. */
  removeIfPresent(channelId: string): Promise<Auction | null>;
}
