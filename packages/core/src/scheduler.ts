import type { IScheduler, TimerHandle } from "./interfaces.js"

/**
 * Scheduler on top of the global setTimeout/clearTimeout.
 */
export const timerScheduler: IScheduler = {
	scheduleOnce(delayMs: number, callback: () => void): TimerHandle {
		return setTimeout(callback, delayMs)
	},

	cancel(handle: TimerHandle): void {
		if (isTimeout(handle)) {
			clearTimeout(handle)
		}
	},
}

function isTimeout(handle: TimerHandle): handle is ReturnType<typeof setTimeout> {
	return typeof handle === "number" || (typeof handle === "object" && handle !== null)
}
