/**
 * Dispatch queue — the one structure shared by producers and the relay.
 *
 * Producers `put` from any task; a single consumer drains with `poll` and
 * parks on `waitForItem` while the queue is empty. Unbounded by default.
 */

export type OverflowPolicy = 'drop-oldest' | 'block';

export interface DispatchQueueOptions {
	/** Maximum buffered items (default: unbounded) */
	capacity?: number;
	/** What `put` does when the queue is full (default: 'block') */
	overflow?: OverflowPolicy;
}

interface BlockedProducer<T> {
	item: T;
	admit: () => void;
}

export class DispatchQueue<T> {
	readonly capacity: number;
	readonly overflow: OverflowPolicy;
	private readonly items: T[] = [];
	private readonly blocked: BlockedProducer<T>[] = [];
	private readonly waiters = new Set<(ready: boolean) => void>();
	private droppedCount = 0;

	constructor(options: DispatchQueueOptions = {}) {
		const capacity = options.capacity ?? Number.POSITIVE_INFINITY;
		if (!(capacity > 0)) throw new RangeError(`Queue capacity must be positive, got ${capacity}`);
		this.capacity = capacity;
		this.overflow = options.overflow ?? 'block';
	}

	/**
	 * Enqueue an item.
	 *
	 * When there is room the item is buffered before this returns and the
	 * promise is already settled. On a full queue, 'drop-oldest' discards the
	 * oldest buffered item; 'block' parks the item until space frees up.
	 */
	put(item: T): Promise<void> {
		if (this.items.length < this.capacity && this.blocked.length === 0) {
			this.items.push(item);
			this.notify();
			return Promise.resolve();
		}

		if (this.overflow === 'drop-oldest') {
			this.items.shift();
			this.droppedCount++;
			this.items.push(item);
			this.notify();
			return Promise.resolve();
		}

		return new Promise<void>((resolve) => {
			this.blocked.push({ item, admit: resolve });
		});
	}

	/** Take the oldest item without waiting. */
	poll(): T | undefined {
		const item = this.items.shift();
		if (item !== undefined) this.admitBlocked();
		return item;
	}

	/**
	 * Resolve true once an item is available, or false if the signal aborts
	 * first. Resolves immediately when the queue is not empty.
	 */
	waitForItem(signal?: AbortSignal): Promise<boolean> {
		if (this.items.length > 0) return Promise.resolve(true);
		if (signal?.aborted) return Promise.resolve(false);

		return new Promise<boolean>((resolve) => {
			const onAbort = () => {
				this.waiters.delete(waiter);
				resolve(false);
			};
			const waiter = (ready: boolean) => {
				signal?.removeEventListener('abort', onAbort);
				resolve(ready);
			};
			this.waiters.add(waiter);
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}

	/** Items currently buffered (parked producers excluded) */
	get size(): number {
		return this.items.length;
	}

	/** Items parked by a full 'block' queue */
	get blockedCount(): number {
		return this.blocked.length;
	}

	/** Items discarded by the 'drop-oldest' policy */
	get dropped(): number {
		return this.droppedCount;
	}

	private admitBlocked(): void {
		while (this.blocked.length > 0 && this.items.length < this.capacity) {
			const next = this.blocked.shift();
			if (!next) break;
			this.items.push(next.item);
			next.admit();
		}
		if (this.items.length > 0) this.notify();
	}

	private notify(): void {
		if (this.waiters.size === 0) return;
		const waiters = [...this.waiters];
		this.waiters.clear();
		for (const waiter of waiters) waiter(true);
	}
}
