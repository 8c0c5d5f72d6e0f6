import { vi } from "vitest";
import { Auction } from "../../src/domain/entities/auction";
import { AuctionUpdate } from "../../src/application/ports/repositories";
import { InMemoryAuctionRegistry } from "../../src/infrastructure/repositories/inMemoryAuctionRegistry";

type MockRegistryOptions = {
  // Extra microtask hops per call, to let concurrent callers interleave.
  yieldTicks?: number;
};

export function createMockAuctionRegistry(options: MockRegistryOptions = {}) {
  const store = new InMemoryAuctionRegistry();
  const pause = async () => {
    for (let i = 0; i < (options.yieldTicks ?? 0); i++) {
      await Promise.resolve();
    }
  };

  return {
    _store: store,
    findByChannel: vi.fn(async (channelId: string) => {
      await pause();
      return store.findByChannel(channelId);
    }),
    listActive: vi.fn(async () => {
      await pause();
      return store.listActive();
    }),
    insertIfAbsent: vi.fn(async (auction: Auction) => {
      await pause();
      return store.insertIfAbsent(auction);
    }),
    update: vi.fn(async (channelId: string, update: AuctionUpdate) => {
      await pause();
      return store.update(channelId, update);
    }),
    removeIfPresent: vi.fn(async (channelId: string) => {
      await pause();
      return store.removeIfPresent(channelId);
    })
  };
}

export type MockAuctionRegistry = ReturnType<typeof createMockAuctionRegistry>;

export async function seedAuction(
  registry: Pick<MockAuctionRegistry, "_store">,
  overrides: Partial<Auction> = {}
): Promise<Auction> {
  const startTime = new Date();
  const auction: Auction = {
    channelId: "channel-1",
    item: "Dragon Sword",
    durationText: "5m",
    startTime,
    endTime: new Date(startTime.getTime() + 5 * 60_000),
    bids: new Map(),
    ...overrides
  };
  await registry._store.insertIfAbsent(auction);
  return auction;
}
