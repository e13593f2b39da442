import { setTimeout as sleep } from "node:timers/promises";
import type winston from "winston";

import { errorMessage, isFatal } from "../lib/errors";
import type { SyncReport } from "./orchestrator";

export interface SyncCycle {
	runOnce(): Promise<SyncReport>;
}

export interface ScheduleOptions {
	intervalMs: number;
	signal: AbortSignal;
	logger: winston.Logger;
}

/**
 * Run `cycle` until `signal` aborts, waiting `intervalMs` after each cycle.
 * Cycles never overlap. A failed cycle is logged and retried on the next
 * tick unless the failure is fatal. Resolves with the number of cycles run.
 */
export async function runPeriodically(cycle: SyncCycle, opts: ScheduleOptions): Promise<number> {
	const { intervalMs, signal, logger } = opts;
	let cycles = 0;

	while (!signal.aborted) {
		try {
			await cycle.runOnce();
		} catch (err) {
			if (isFatal(err)) {
				throw err;
			}
			logger.error("sync: cycle failed, retrying in %dms: %s", intervalMs, errorMessage(err));
		}
		cycles++;

		if (signal.aborted) break;
		try {
			await sleep(intervalMs, undefined, { signal });
		} catch (err) {
			if (signal.aborted) break;
			throw err;
		}
	}

	return cycles;
}
