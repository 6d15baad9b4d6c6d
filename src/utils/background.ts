import { logger } from "./logger";

/**
 * Long-running work started from an update handler (fan-out to voters or
 * users). The handler returns at once; `drain` waits for whatever is still
 * running, at shutdown and in tests.
 */
export class BackgroundTasks {
    private readonly pending = new Set<Promise<void>>();

    get size() {
        return this.pending.size;
    }

    run(label: string, task: () => Promise<unknown>): void {
        const running: Promise<void> = Promise.resolve()
            .then(task)
            .then(
                () => undefined,
                (err) => logger.error(`Background task failed: ${label}`, err),
            )
            .finally(() => this.pending.delete(running));
        this.pending.add(running);
    }

    async drain(): Promise<void> {
        while (this.pending.size) await Promise.all(this.pending);
    }
}
