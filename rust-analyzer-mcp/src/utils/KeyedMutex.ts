/**
 * Serializes async sections that share a key. Sections on different keys run
 * concurrently; sections on the same key run in arrival order.
 */
export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    public async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    public isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
