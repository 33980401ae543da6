export type LazyState<T> = { status: 'unloaded' } | { status: 'loaded'; value: T }

/**
 * A remotely backed value fetched on first use and kept until refreshed.
 * Concurrent callers of {@link ensureLoaded} share one in-flight fetch.
 */
export class Lazy<T> {
    private state: LazyState<T> = { status: 'unloaded' }
    private loading?: Promise<T>

    constructor(private readonly loader: () => Promise<T>) {}

    static of<T>(loader: () => Promise<T>, initial?: T): Lazy<T> {
        const lazy = new Lazy(loader)
        if (initial !== undefined) lazy.set(initial)
        return lazy
    }

    get isLoaded(): boolean {
        return this.state.status === 'loaded'
    }

    /** The value if loaded; never triggers a fetch. */
    peek(): T | undefined {
        return this.state.status === 'loaded' ? this.state.value : undefined
    }

    set(value: T): void {
        this.state = { status: 'loaded', value }
    }

    reset(): void {
        this.state = { status: 'unloaded' }
        this.loading = undefined
    }

    async ensureLoaded(): Promise<T> {
        if (this.state.status === 'loaded') return this.state.value
        if (!this.loading) {
            // A reset() while this fetch is in flight discards its result
            const loading: Promise<T> = this.loader().then(
                (value) => {
                    if (this.loading === loading) {
                        this.state = { status: 'loaded', value }
                        this.loading = undefined
                    }
                    return value
                },
                (error: unknown) => {
                    if (this.loading === loading) this.loading = undefined
                    throw error
                }
            )
            this.loading = loading
        }
        return this.loading
    }

    async refresh(): Promise<T> {
        this.reset()
        return this.ensureLoaded()
    }
}
