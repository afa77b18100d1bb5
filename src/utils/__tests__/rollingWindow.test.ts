import { RollingWindow } from "../rollingWindow";

describe("RollingWindow", () => {
	it("should evict the oldest item on overflow", () => {
		const window = new RollingWindow<number>(2);
		expect(window.push(1)).toBeUndefined();
		window.push(2);
		expect(window.full).toBe(true);
		expect(window.push(3)).toBe(1);
		expect(window.toArray()).toEqual([2, 3]);
		expect(window.last()).toBe(3);
		expect(window.last(1)).toBe(2);
	});

	it("should reject a capacity below one", () => {
		expect(() => new RollingWindow(0)).toThrow("positive integer");
	});
});
