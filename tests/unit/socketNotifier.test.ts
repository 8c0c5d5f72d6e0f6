import { describe, it, expect, vi } from "vitest";
import {
  channelRoom,
  mayJoinChannel,
  RoomMember,
  SocketNotifier,
  userRoom,
  WirePayload
} from "../../src/presentation/ws/socket";
import { AuctionEvent } from "../../src/application/ports/services";

type Emitted = { room: string; event: AuctionEvent["type"]; payload: WirePayload };

// rooms: userId -> the rooms each of that user's sockets has joined
function createTransport(rooms: Record<string, Array<{ rooms: string[]; displayName?: string }>> = {}) {
  const emitted: Emitted[] = [];
  return {
    _emitted: emitted,
    emitToRoom: vi.fn((room: string, event: AuctionEvent["type"], payload: WirePayload) => {
      emitted.push({ room, event, payload });
    }),
    socketsInRoom: vi.fn(async (room: string): Promise<RoomMember[]> => {
      const userId = room.replace(/^user:/, "");
      return (rooms[userId] ?? []).map((socket) => ({
        rooms: new Set([room, ...socket.rooms]),
        displayName: socket.displayName
      }));
    })
  };
}

const winnerEvent: AuctionEvent = { type: "auction:winner", item: "Dragon Sword", winnerName: "Bob", displayAmount: "1p" };

describe("room helpers", () => {
  it("names channel and user rooms", () => {
    expect(channelRoom("channel-1")).toBe("channel:channel-1");
    expect(userRoom("alice")).toBe("user:alice");
  });
});

describe("SocketNotifier", () => {
  it("broadcasts channel events with the end time as an ISO string", async () => {
    const transport = createTransport();
    const notifier = new SocketNotifier(transport);

    await notifier.notify(
      { kind: "channel", channelId: "channel-1" },
      { type: "auction:extended-notice", item: "Dragon Sword", endTime: new Date("2024-01-01T10:00:20Z") }
    );

    expect(transport._emitted).toEqual([
      {
        room: "channel:channel-1",
        event: "auction:extended-notice",
        payload: { type: "auction:extended-notice", item: "Dragon Sword", endTime: "2024-01-01T10:00:20.000Z" }
      }
    ]);
  });

  it("sends results events to the configured results channel", async () => {
    const transport = createTransport();
    const notifier = new SocketNotifier(transport, "results-1");

    await notifier.notify({ kind: "results" }, winnerEvent);

    expect(transport._emitted).toEqual([
      { room: "channel:results-1", event: "auction:winner", payload: { ...winnerEvent } }
    ]);
  });

  it("drops results events when no results channel is configured", async () => {
    const transport = createTransport();
    const notifier = new SocketNotifier(transport);

    await notifier.notify({ kind: "results" }, winnerEvent);

    expect(transport.emitToRoom).not.toHaveBeenCalled();
  });

  it("sends a private event to a user connected in the channel", async () => {
    const transport = createTransport({ alice: [{ rooms: ["channel:channel-1"] }] });
    const notifier = new SocketNotifier(transport);

    await notifier.notify(
      { kind: "user", channelId: "channel-1", userId: "alice" },
      { type: "bid:outbid", item: "Dragon Sword", displayAmount: "5g" }
    );

    expect(transport._emitted).toEqual([
      {
        room: "user:alice",
        event: "bid:outbid",
        payload: { type: "bid:outbid", item: "Dragon Sword", displayAmount: "5g" }
      }
    ]);
  });

  it("rejects a user with no connected socket", async () => {
    const notifier = new SocketNotifier(createTransport());

    await expect(
      notifier.notify({ kind: "user", channelId: "channel-1", userId: "alice" }, winnerEvent)
    ).rejects.toMatchObject({ code: "USER_UNREACHABLE", status: 404 });
  });

  it("rejects a user who is connected only in another channel", async () => {
    const transport = createTransport({ alice: [{ rooms: ["channel:channel-2"] }] });
    const notifier = new SocketNotifier(transport);

    await expect(
      notifier.notify({ kind: "user", channelId: "channel-1", userId: "alice" }, winnerEvent)
    ).rejects.toMatchObject({ code: "USER_UNREACHABLE" });
    expect(transport.emitToRoom).not.toHaveBeenCalled();
  });

  it("resolves a member from the socket that joined the channel", async () => {
    const transport = createTransport({
      alice: [
        { rooms: ["channel:channel-2"], displayName: "Alice (elsewhere)" },
        { rooms: ["channel:channel-1"], displayName: "Alice" }
      ]
    });
    const notifier = new SocketNotifier(transport);

    expect(await notifier.resolveMember("channel-1", "alice")).toEqual({ userId: "alice", displayName: "Alice" });
  });

  it("falls back to the user id as display name", async () => {
    const notifier = new SocketNotifier(createTransport({ bob: [{ rooms: ["channel:channel-1"] }] }));

    expect(await notifier.resolveMember("channel-1", "bob")).toEqual({ userId: "bob", displayName: "bob" });
  });

  it("does not resolve a user outside the channel", async () => {
    const notifier = new SocketNotifier(createTransport({ bob: [{ rooms: ["channel:channel-2"] }] }));

    expect(await notifier.resolveMember("channel-1", "bob")).toBeNull();
  });
});

describe("mayJoinChannel", () => {
  const access = { resultsChannelId: "results-1", adminToken: "test-admin-token" };

  it("lets anyone join an auction channel", () => {
    expect(mayJoinChannel("channel-1", access)).toBe(true);
  });

  it("requires the admin token for the results channel", () => {
    expect(mayJoinChannel("results-1", access)).toBe(false);
    expect(mayJoinChannel("results-1", access, "wrong-token")).toBe(false);
    expect(mayJoinChannel("results-1", access, "test-admin-token")).toBe(true);
  });

  it("leaves the results channel open without an admin token", () => {
    expect(mayJoinChannel("results-1", { resultsChannelId: "results-1", adminToken: "" })).toBe(true);
  });
});
