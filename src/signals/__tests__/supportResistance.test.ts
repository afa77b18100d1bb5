import { SupportResistance } from "../supportResistance";

describe("SupportResistance", () => {
	it("should track the extremes of the last candles, the current one included", () => {
		const sr = new SupportResistance(3, 0.5);
		expect(sr.update({ high: 105, low: 95, close: 100 })).toEqual({
			nearResistance: false,
			nearSupport: false,
			support: 95,
			resistance: 105,
		});
		sr.update({ high: 104, low: 96, close: 100 });
		sr.update({ high: 104.2, low: 99.8, close: 104 });

		const proximity = sr.update({ high: 104.3, low: 100, close: 104.1 });
		expect(proximity).toEqual({
			nearResistance: true,
			nearSupport: false,
			support: 96,
			resistance: 104.3,
		});
	});

	it("should start over after clear", () => {
		const sr = new SupportResistance(3, 0.5);
		sr.update({ high: 200, low: 50, close: 100 });
		sr.clear();
		expect(sr.update({ high: 101, low: 99, close: 100 })).toMatchObject({
			support: 99,
			resistance: 101,
		});
	});
});
