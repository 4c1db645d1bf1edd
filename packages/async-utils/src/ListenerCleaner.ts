export type Cleaner = () => void | Promise<void>;

/**
 * Collects teardown callbacks and runs them together, e.g. when a configured
 * entry is unloaded.
 */
export class ListenerCleaner {
    private cleaners: Cleaner[] = [];

    add(cleanerCallback: Cleaner): void {
        this.cleaners.push(cleanerCallback);
    }

    get size(): number {
        return this.cleaners.length;
    }

    cleaner(): () => Promise<void> {
        return () => this.cleanUp();
    }

    /**
     * Call all the cleaner callbacks and reset this cleaner to be reused.
     * Every callback runs even if an earlier one fails; failures are rethrown together.
     */
    async cleanUp(): Promise<void> {
        const pending = this.cleaners;
        this.cleaners = [];
        const errors: unknown[] = [];
        for (const cleaner of pending) {
            try {
                await cleaner();
            } catch (error) {
                errors.push(error);
            }
        }
        if (errors.length === 1) {
            throw errors[0];
        }
        if (errors.length > 1) {
            throw new AggregateError(errors, `${errors.length} cleanup callbacks failed`);
        }
    }
}
