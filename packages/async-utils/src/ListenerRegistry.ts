export type Listener<TArgs extends unknown[]> = (...args: TArgs) => void;

/**
 * Explicit callback list with add/remove.
 * Owners pass the registry to whoever needs to subscribe instead of relying on global state.
 */
export class ListenerRegistry<TArgs extends unknown[] = []> {
    private listeners: Listener<TArgs>[] = [];

    /**
     * Register a listener.
     * @returns a function removing exactly this registration
     */
    add(listener: Listener<TArgs>): () => void {
        this.listeners.push(listener);
        let removed = false;
        return () => {
            if (removed) {
                return;
            }
            removed = true;
            this.remove(listener);
        };
    }

    remove(listener: Listener<TArgs>): boolean {
        const index = this.listeners.indexOf(listener);
        if (index === -1) {
            return false;
        }
        this.listeners.splice(index, 1);
        return true;
    }

    get size(): number {
        return this.listeners.length;
    }

    /**
     * Call every listener registered at the time of the call.
     * A throwing listener is logged and does not prevent the others from running.
     */
    notify(...args: TArgs): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(...args);
            } catch (error) {
                console.error('[listeners] Listener failed:', error);
            }
        }
    }

    clear(): void {
        this.listeners = [];
    }
}
