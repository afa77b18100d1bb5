import { BoundedMap } from "../boundedMap";

describe("BoundedMap", () => {
	it("should forget the oldest entry past its capacity", () => {
		const map = new BoundedMap<string, number>(2);
		map.set("a", 1).set("b", 2).set("c", 3);
		expect(map.size).toBe(2);
		expect(map.has("a")).toBe(false);
		expect(map.get("c")).toBe(3);
	});

	it("should count a rewritten key as the newest", () => {
		const map = new BoundedMap<string, number>(2);
		map.set("a", 1).set("b", 2).set("a", 10).set("c", 3);
		expect(map.get("a")).toBe(10);
		expect(map.has("b")).toBe(false);
	});
});
