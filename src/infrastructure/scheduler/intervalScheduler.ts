import { ExpiryScheduler } from "../../application/ports/services";
import { CloseExpiredAuctionsUseCase } from "../../application/usecases/closeExpiredAuctions";
import { log, logError } from "../logging/logger";

export class IntervalExpiryScheduler implements ExpiryScheduler {
  private timer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly closeExpired: CloseExpiredAuctionsUseCase,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    log("info", "scheduler.started", { intervalMs: this.intervalMs });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log("info", "scheduler.stopped");
    }
    await Promise.all([...this.inFlight]);
  }

  // Passes may overlap when settlement is slow; claims under the channel lock keep that safe.
  private tick(): void {
    const pass: Promise<void> = this.closeExpired
      .execute()
      .then(
        (outcomes) => {
          if (outcomes.length > 0) {
            log("debug", "scheduler.pass", { closed: outcomes.length });
          }
        },
        (error: unknown) => {
          logError("scheduler.scan_failed", error);
        }
      )
      .finally(() => {
        this.inFlight.delete(pass);
      });
    this.inFlight.add(pass);
  }
}
