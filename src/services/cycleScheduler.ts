import { createLogger, describeError } from "../utils/log";
import { CycleSummary, PollingCycle } from "./pollingCycle";

const log = createLogger("scheduler");

export const DEFAULT_TICK_MS = 30_000;

export class CycleAlreadyRunningError extends Error {
  constructor() {
    super("A polling cycle is already running.");
    this.name = "CycleAlreadyRunningError";
  }
}

export type ZonedClock = {
  /** YYYY-MM-DD in the zone. */
  day: string;
  /** Minutes since local midnight in the zone. */
  minutes: number;
};

export function zonedClock(date: Date, timeZone: string): ZonedClock {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((entry) => entry.type === type)?.value ?? "00";

  return {
    day: `${part("year")}-${part("month")}-${part("day")}`,
    minutes: Number(part("hour")) * 60 + Number(part("minute")),
  };
}

export function slotMinutes(slot: string): number {
  const [hours, minutes] = slot.split(":").map(Number);
  return (hours ?? 0) * 60 + (minutes ?? 0);
}

export type CycleSchedulerOptions = {
  times: string[];
  timeZone: string;
  tickMs?: number;
  now?: () => Date;
};

/**
 * Fires the cycle once per configured HH:MM slot per day, read in the
 * configured zone. Slots already past when the scheduler starts wait until
 * the next day. Only one cycle runs at a time.
 */
export class CycleScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;

  private running = false;

  private readonly lastRunDay = new Map<string, string>();

  private readonly now: () => Date;

  constructor(
    private readonly cycle: Pick<PollingCycle, "run" | "notifyCriticalError">,
    private readonly options: CycleSchedulerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    const clock = zonedClock(this.now(), this.options.timeZone);
    for (const slot of this.options.times) {
      if (slotMinutes(slot) <= clock.minutes) {
        this.lastRunDay.set(slot, clock.day);
      }
    }

    const tickMs = this.options.tickMs ?? DEFAULT_TICK_MS;
    log.info("scheduler_started", {
      times: this.options.times,
      time_zone: this.options.timeZone,
      tick_ms: tickMs,
    });

    this.timer = setInterval(() => {
      this.tick().catch((error) =>
        log.critical("scheduler_tick_error", { error: describeError(error) }),
      );
    }, tickMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info("scheduler_stopped");
    }
  }

  /** Runs the cycle when a slot is due. Resolves true when a cycle ran. */
  async tick(): Promise<boolean> {
    const clock = zonedClock(this.now(), this.options.timeZone);
    const due = this.options.times.filter(
      (slot) => slotMinutes(slot) <= clock.minutes && this.lastRunDay.get(slot) !== clock.day,
    );

    if (due.length === 0) {
      return false;
    }

    if (this.running) {
      log.warn("cycle_skipped_overlap", { slots: due });
      return false;
    }

    for (const slot of due) {
      this.lastRunDay.set(slot, clock.day);
    }

    log.info("cycle_slot_due", { slots: due, day: clock.day });
    try {
      await this.runNow();
    } catch (error) {
      // runNow already notified the administrator.
      log.error("scheduled_cycle_failed", { error: describeError(error) });
    }
    return true;
  }

  /** Runs one cycle immediately; a throwing cycle is reported and rethrown. */
  async runNow(): Promise<CycleSummary> {
    if (this.running) {
      throw new CycleAlreadyRunningError();
    }

    this.running = true;
    try {
      return await this.cycle.run();
    } catch (error) {
      await this.cycle.notifyCriticalError(
        error,
        error instanceof Error ? error.stack ?? null : null,
      );
      throw error;
    } finally {
      this.running = false;
    }
  }
}
