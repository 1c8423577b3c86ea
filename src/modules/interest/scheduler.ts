import { LoggerLike, silentLogger } from "../../common/logger";
import { InterestService } from "./service";

/** Runs accrual on a fixed interval; a tick that lands mid-run is dropped. */
export class InterestScheduler {
  private intervalId?: NodeJS.Timeout;
  private running: Promise<void> | null = null;

  constructor(
    private readonly interest: InterestService,
    private readonly intervalMs: number,
    private readonly logger: LoggerLike = silentLogger
  ) {}

  isStarted(): boolean {
    return this.intervalId !== undefined;
  }

  start(): void {
    if (this.intervalId) {
      this.logger.warn({}, "Interest scheduler already running");
      return;
    }
    this.intervalId = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.intervalId.unref();
    this.logger.info({ intervalMs: this.intervalMs }, "Interest scheduler started");
  }

  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.info({}, "Interest scheduler stopped");
    }
    await this.running;
  }

  runOnce(): Promise<void> {
    if (this.running) {
      this.logger.debug({}, "Interest accrual still in progress, skipping tick");
      return this.running;
    }
    this.running = this.interest
      .accrueDaily()
      .then(() => undefined)
      .catch((err: unknown) => {
        this.logger.error({ err }, "Scheduled interest accrual failed");
      })
      .finally(() => {
        this.running = null;
      });
    return this.running;
  }
}
