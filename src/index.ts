import http from "node:http";
import { env } from "./config/env";
import { InMemoryAuctionRegistry } from "./infrastructure/repositories/inMemoryAuctionRegistry";
import { KeyedMutexLock } from "./infrastructure/locks/keyedMutex";
import { IntervalExpiryScheduler } from "./infrastructure/scheduler/intervalScheduler";
import { createApp } from "./presentation/http/app";
import { initSocketServer, SocketNotifier, socketTransport } from "./presentation/ws/socket";
import { StartAuctionUseCase } from "./application/usecases/startAuction";
import { PlaceBidUseCase } from "./application/usecases/placeBid";
import { SettleAuctionUseCase } from "./application/usecases/settleAuction";
import { CloseExpiredAuctionsUseCase } from "./application/usecases/closeExpiredAuctions";
import { log, logError, setLogLevel } from "./infrastructure/logging/logger";

async function bootstrap() {
  setLogLevel(env.LOG_LEVEL);

  const registry = new InMemoryAuctionRegistry();
  const lock = new KeyedMutexLock();

  const server = http.createServer();
  const io = initSocketServer(server, {
    corsOrigin: env.CORS_ORIGIN,
    resultsChannelId: env.RESULTS_CHANNEL_ID,
    adminToken: env.ADMIN_TOKEN
  });
  const notifier = new SocketNotifier(socketTransport(io), env.RESULTS_CHANNEL_ID);

  const startAuction = new StartAuctionUseCase(
    registry,
    lock,
    notifier,
    {
      minimumDurationMs: env.AUCTION_MIN_DURATION_MS,
      antiSnipingThresholdMs: env.AUCTION_ANTI_SNIPING_THRESHOLD_MS,
      antiSnipingExtensionMs: env.AUCTION_ANTI_SNIPING_EXTENSION_MS
    },
    env.AUCTION_LOCK_TIMEOUT_MS
  );

  const placeBid = new PlaceBidUseCase(
    registry,
    lock,
    notifier,
    env.AUCTION_ANTI_SNIPING_THRESHOLD_MS,
    env.AUCTION_ANTI_SNIPING_EXTENSION_MS,
    env.AUCTION_LOCK_TIMEOUT_MS
  );

  const settleAuction = new SettleAuctionUseCase(notifier);
  const closeExpired = new CloseExpiredAuctionsUseCase(
    registry,
    lock,
    settleAuction,
    env.AUCTION_LOCK_TIMEOUT_MS
  );
  const scheduler = new IntervalExpiryScheduler(closeExpired, env.AUCTION_SCAN_INTERVAL_MS);

  const app = createApp(
    {
      startAuction,
      placeBid,
      registry,
      adminToken: env.ADMIN_TOKEN
    },
    env.CORS_ORIGIN
  );
  server.on("request", (req, res) => {
    if (req.url?.startsWith("/socket.io")) {
      return;
    }
    app(req, res);
  });

  const shutdown = (signal: string) => {
    log("info", "server.stopping", { signal });
    scheduler
      .stop()
      .then(() => {
        io.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logError("server.shutdown_failed", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  scheduler.start();
  server.listen(env.PORT, () => {
    log("info", "server.started", { port: env.PORT });
  });
}

bootstrap().catch((error) => {
  logError("server.bootstrap_failed", error);
  process.exit(1);
});
