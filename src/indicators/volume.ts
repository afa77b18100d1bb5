import type { Reading } from "../types";
import { RollingWindow } from "../utils/rollingWindow";
import { mean, stdDev } from "./bollinger";
import { ready, warmingUp } from "./reading";

/** z-score of the latest volume against the last `period` volumes, itself included. */
export class VolumeZScore {
	private readonly volumes: RollingWindow<number>;

	constructor(readonly period: number) {
		this.volumes = new RollingWindow(period);
	}

	update(volume: number): Reading<number> {
		this.volumes.push(volume);
		if (!this.volumes.full) return warmingUp;

		const values = this.volumes.toArray();
		const sigma = stdDev(values);
		if (sigma === 0) return ready(0);
		return ready((volume - mean(values)) / sigma);
	}
}
