export function shouldExtendAuction(endTime: Date, now: Date, thresholdMs: number): boolean {
  return endTime.getTime() - now.getTime() <= thresholdMs;
}

// Deadline becomes now + extension, but never earlier than it already was.
export function extendAuction(endTime: Date, now: Date, extensionMs: number): Date {
  return new Date(Math.max(endTime.getTime(), now.getTime() + extensionMs));
}
