export type AuctionErrorCode =
  | "INVALID_BID_FORMAT"
  | "INVALID_DURATION_FORMAT"
  | "AUCTION_ALREADY_ACTIVE"
  | "NO_ACTIVE_AUCTION"
  | "AUCTION_ENDED"
  | "BID_NOT_HIGHER_THAN_OWN"
  | "BID_NOT_HIGHEST_OVERALL"
  | "LOCK_TIMEOUT"
  | "USER_UNREACHABLE";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number = 400,
    public readonly code: AuctionErrorCode | "BAD_REQUEST" = "BAD_REQUEST"
  ) {
    super(message);
    this.name = "AppError";
  }
}
