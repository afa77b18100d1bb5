import type { Reading } from "../types";

export const warmingUp: Reading<never> = { ready: false };

export function ready<T>(value: T): Reading<T> {
	return { ready: true, value };
}

export function valueOf<T>(reading: Reading<T>): T | undefined {
	return reading.ready ? reading.value : undefined;
}
