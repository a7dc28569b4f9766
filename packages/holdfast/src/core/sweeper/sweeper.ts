import { Cron } from "croner";
import type { EventRegistry } from "../registry/registry";
import type { SweeperOptions } from "./types";

/**
 * Periodic `cleanupDeadAll()` for an {@link EventRegistry}, scheduled via `croner`.
 *
 * Never starts by itself: the owning process calls `start()`.
 * `start()` and `stop()` are idempotent.
 */
export class Sweeper {
    private job: Cron | null = null;

    constructor(
        private readonly registry: EventRegistry,
        private readonly options: SweeperOptions,
    ) {
        if (!options.cron || options.cron.trim().length === 0) {
            throw new Error("[holdfast] Sweeper: cron must be a non-empty string");
        }
    }

    get isRunning(): boolean {
        return this.job !== null;
    }

    start(): void {
        if (this.job) return;
        this.job = new Cron(
            this.options.cron,
            { timezone: this.options.timezone, protect: true, unref: true },
            () => {
                this.sweepNow();
            },
        );
    }

    stop(): void {
        this.job?.stop();
        this.job = null;
    }

    /** Run one sweep immediately. Returns the number of associations dropped. */
    sweepNow(): number {
        const dropped = this.registry.cleanupDeadAll();
        if (dropped > 0) {
            this.registry.logger.debug(this.registry.name, `sweep dropped ${dropped} dead weak listener owner(s)`);
        }
        return dropped;
    }

    nextRunAt(): Date | null {
        return this.job?.nextRun() ?? null;
    }
}
