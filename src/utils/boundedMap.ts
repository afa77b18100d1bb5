/** Insertion-ordered map that forgets its oldest entries past `capacity`. */
export class BoundedMap<K, V> {
	private readonly entries = new Map<K, V>();

	constructor(readonly capacity: number) {}

	get size(): number {
		return this.entries.size;
	}

	get(key: K): V | undefined {
		return this.entries.get(key);
	}

	has(key: K): boolean {
		return this.entries.has(key);
	}

	set(key: K, value: V): this {
		this.entries.delete(key);
		this.entries.set(key, value);
		while (this.entries.size > this.capacity) {
			const oldest = this.entries.keys().next();
			if (oldest.done) break;
			this.entries.delete(oldest.value);
		}
		return this;
	}

	delete(key: K): boolean {
		return this.entries.delete(key);
	}
}
