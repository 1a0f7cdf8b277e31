import { ConflictError, describeError } from '../lib/errors';
import { SweepReport, formatSweepSummary } from './AlertingEngine';

export interface SweepRunner {
    runSweep(signal?: AbortSignal): Promise<SweepReport>;
}

export interface SchedulerStatus {
    running: boolean;
    sweeping: boolean;
    interval_seconds: number;
    sweeps_completed: number;
    last_report: SweepReport | null;
    last_error: string | null;
}

/**
 * Runs the alert sweep on a fixed interval. Sweeps never overlap: timer
 * ticks and manual runs queue behind the one in flight.
 */
export class AlertScheduler {
    private readonly intervalMs: number;
    private running = false;
    private timer: NodeJS.Timeout | null = null;
    private queue: Promise<void> = Promise.resolve();
    private pending = 0;
    private abortController: AbortController | null = null;
    private stopping: Promise<void> | null = null;
    private sweepsCompleted = 0;
    private lastReport: SweepReport | null = null;
    private lastError: string | null = null;

    constructor(private readonly engine: SweepRunner, private readonly intervalSeconds: number) {
        this.intervalMs = intervalSeconds * 1000;
    }

    start() {
        if (this.running || this.stopping) return;
        this.running = true;
        this.abortController = new AbortController();
        console.log(`[AlertScheduler] Starting alert evaluation every ${this.intervalSeconds}s`);
        this.scheduleNext(0);
    }

    /**
     * Stops future sweeps and waits for the one in flight. The in-flight
     * sweep stops between hosts; each pair's write is a single atomic update.
     * Repeat calls while stopping share the same promise.
     */
    stop(): Promise<void> {
        if (this.stopping) return this.stopping;
        if (!this.running) return Promise.resolve();
        this.running = false;

        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.abortController?.abort();

        this.stopping = this.queue.then(() => {
            this.stopping = null;
            console.log('[AlertScheduler] Stopped');
        });
        return this.stopping;
    }

    /** Runs a sweep now, after any sweep already in flight. */
    async runNow(): Promise<SweepReport> {
        if (!this.running) {
            throw new ConflictError('Alert scheduler is not running');
        }
        return this.enqueue();
    }

    isRunning() {
        return this.running;
    }

    getStatus(): SchedulerStatus {
        return {
            running: this.running,
            sweeping: this.pending > 0,
            interval_seconds: this.intervalSeconds,
            sweeps_completed: this.sweepsCompleted,
            last_report: this.lastReport,
            last_error: this.lastError,
        };
    }

    private scheduleNext(delayMs: number) {
        if (!this.running) return;

        const tick = async () => {
            this.timer = null;
            try {
                await this.enqueue();
            } catch (error) {
                console.error('[AlertScheduler] Sweep failed, retrying next interval:', error);
            } finally {
                this.scheduleNext(this.intervalMs);
            }
        };

        this.timer = setTimeout(tick, delayMs);
    }

    private enqueue(): Promise<SweepReport> {
        this.pending += 1;
        const run = this.queue.then(() => this.sweep());

        this.queue = run.then(
            () => {
                this.pending -= 1;
            },
            (error: unknown) => {
                this.pending -= 1;
                this.lastError = describeError(error);
            }
        );
        return run;
    }

    private async sweep(): Promise<SweepReport> {
        const report = await this.engine.runSweep(this.abortController?.signal);
        this.sweepsCompleted += 1;
        this.lastReport = report;
        this.lastError = null;
        console.log(`[AlertScheduler] Sweep complete: ${formatSweepSummary(report)}`);
        return report;
    }
}
