export type BidderId = string;

export interface Auction {
  channelId: string;
  item: string;
  durationText: string;
  startTime: Date;
  endTime: Date;
  bids: ReadonlyMap<BidderId, number>;
}

export interface HighestBid {
  bidderId: BidderId;
  amount: number;
}
