import { Server } from "socket.io";
import http from "node:http";
import { z } from "zod";
import { AppError } from "../../application/errors";
import {
  AuctionEvent,
  MemberContact,
  NotificationTarget,
  Notifier
} from "../../application/ports/services";
import { log } from "../../infrastructure/logging/logger";

export type WirePayload = Record<string, unknown>;

type ClientToServerEvents = {
  join: (payload: { channelId: string; token?: string }) => void;
};

type ServerToClientEvents = {
  [Type in AuctionEvent["type"]]: (payload: WirePayload) => void;
};

type InterServerEvents = Record<string, never>;

type SocketData = {
  userId?: string;
  displayName?: string;
};

export type AuctionSocketServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

export const channelRoom = (channelId: string) => `channel:${channelId}`;
export const userRoom = (userId: string) => `user:${userId}`;

export type ChannelAccess = {
  resultsChannelId?: string;
  adminToken: string;
};

/**
 * The results channel carries winning amounts, so only moderators may listen
 * there. An empty admin token leaves it open, like the moderator routes.
 */
export function mayJoinChannel(channelId: string, access: ChannelAccess, token?: string): boolean {
  if (channelId !== access.resultsChannelId) {
    return true;
  }
  return !access.adminToken || token === access.adminToken;
}

const HandshakeSchema = z.object({
  channelId: z.string().min(1).optional(),
  userId: z.string().min(1).optional(),
  displayName: z.string().min(1).optional(),
  token: z.string().optional()
});

const JoinSchema = z.object({
  channelId: z.string().min(1),
  token: z.string().optional()
});

export type SocketServerOptions = ChannelAccess & {
  corsOrigin: string;
};

export function initSocketServer(server: http.Server, options: SocketServerOptions): AuctionSocketServer {
  const io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(server, {
    cors: {
      origin: options.corsOrigin === "*" ? true : options.corsOrigin,
      credentials: true
    }
  });

  io.on("connection", (socket) => {
    const handshake = HandshakeSchema.safeParse(socket.handshake.query);
    if (!handshake.success) {
      socket.disconnect(true);
      return;
    }
    const { channelId, userId, displayName, token } = handshake.data;
    if (userId) {
      socket.data.userId = userId;
      socket.data.displayName = displayName ?? userId;
      void socket.join(userRoom(userId));
    }
    if (channelId && mayJoinChannel(channelId, options, token)) {
      void socket.join(channelRoom(channelId));
    }
    socket.on("join", (payload) => {
      const parsed = JoinSchema.safeParse(payload);
      if (!parsed.success) {
        return;
      }
      if (!mayJoinChannel(parsed.data.channelId, options, parsed.data.token)) {
        log("warn", "socket.join_refused", { channelId: parsed.data.channelId, userId: socket.data.userId });
        return;
      }
      void socket.join(channelRoom(parsed.data.channelId));
    });
  });

  return io;
}

function toWirePayload(event: AuctionEvent): WirePayload {
  if ("endTime" in event) {
    return { ...event, endTime: event.endTime.toISOString() };
  }
  return { ...event };
}

export type RoomMember = {
  rooms: ReadonlySet<string>;
  displayName?: string;
};

// The two room operations the notifier needs from Socket.IO.
export interface RoomTransport {
  emitToRoom(room: string, event: AuctionEvent["type"], payload: WirePayload): void;
  socketsInRoom(room: string): Promise<RoomMember[]>;
}

export function socketTransport(io: AuctionSocketServer): RoomTransport {
  return {
    emitToRoom(room, event, payload) {
      io.to(room).emit(event, payload);
    },
    async socketsInRoom(room) {
      const sockets = await io.in(room).fetchSockets();
      return sockets.map((socket) => ({ rooms: socket.rooms, displayName: socket.data.displayName }));
    }
  };
}

/**
 * Delivers auction events over Socket.IO rooms. A user counts as reachable in
 * a channel while at least one of their sockets has joined that channel.
 */
export class SocketNotifier implements Notifier {
  constructor(
    private readonly transport: RoomTransport,
    private readonly resultsChannelId?: string
  ) {}

  async notify(target: NotificationTarget, event: AuctionEvent): Promise<void> {
    const payload = toWirePayload(event);
    switch (target.kind) {
      case "channel":
        this.transport.emitToRoom(channelRoom(target.channelId), event.type, payload);
        return;
      case "results":
        if (!this.resultsChannelId) {
          log("debug", "notification.results_disabled", { event: event.type });
          return;
        }
        this.transport.emitToRoom(channelRoom(this.resultsChannelId), event.type, payload);
        return;
      case "user": {
        if (!(await this.findInChannel(target.channelId, target.userId))) {
          throw new AppError(
            `User ${target.userId} is not connected to ${target.channelId}`,
            404,
            "USER_UNREACHABLE"
          );
        }
        this.transport.emitToRoom(userRoom(target.userId), event.type, payload);
        return;
      }
    }
  }

  async resolveMember(channelId: string, userId: string): Promise<MemberContact | null> {
    const member = await this.findInChannel(channelId, userId);
    if (!member) {
      return null;
    }
    return { userId, displayName: member.displayName ?? userId };
  }

  private async findInChannel(channelId: string, userId: string): Promise<RoomMember | undefined> {
    const sockets = await this.transport.socketsInRoom(userRoom(userId));
    return sockets.find((socket) => socket.rooms.has(channelRoom(channelId)));
  }
}
