import { BidderId, HighestBid } from "../entities/auction";

// Accepted bids are strict new maxima, so there is never a tie to break.
export function findHighestBid(bids: ReadonlyMap<BidderId, number>): HighestBid | null {
  let highest: HighestBid | null = null;
  for (const [bidderId, amount] of bids) {
    if (!highest || amount > highest.amount) {
      highest = { bidderId, amount };
    }
  }
  return highest;
}
