/** Fixed-capacity FIFO buffer; the oldest item is evicted on overflow. */
export class RollingWindow<T> {
	private items: T[] = [];

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(`RollingWindow capacity must be a positive integer, got ${capacity}`);
		}
	}

	push(item: T): T | undefined {
		this.items.push(item);
		if (this.items.length > this.capacity) {
			return this.items.shift();
		}
		return undefined;
	}

	get length(): number {
		return this.items.length;
	}

	get full(): boolean {
		return this.items.length === this.capacity;
	}

	last(offset = 0): T | undefined {
		return this.items[this.items.length - 1 - offset];
	}

	toArray(): T[] {
		return [...this.items];
	}

	clear(): void {
		this.items = [];
	}
}
