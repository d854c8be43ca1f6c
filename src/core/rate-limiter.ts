import type { RateLimitConfig } from '../types.js'

interface Window {
	windowStart: number
	callsInWindow: number
}

const windows = new Map<string, Window>()
// Tail of each provider's grant queue; grants for one provider run one at a time.
const queues = new Map<string, Promise<void>>()

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

function getWindow(source: string): Window {
	let window = windows.get(source)
	if (!window) {
		window = { windowStart: 0, callsInWindow: 0 }
		windows.set(source, window)
	}
	return window
}

function rollover(window: Window, config: RateLimitConfig, now: number): void {
	if (now - window.windowStart >= config.windowMs) {
		window.windowStart = now
		window.callsInWindow = 0
	}
}

async function reserve(source: string, config: RateLimitConfig): Promise<void> {
	const window = getWindow(source)
	let now = Date.now()
	rollover(window, config, now)

	// Timers can fire a millisecond early; wait until the window has really elapsed.
	while (window.callsInWindow >= config.maxRequests) {
		const wait = window.windowStart + config.windowMs - now
		if (wait > 0) await sleep(wait)
		now = Date.now()
		rollover(window, config, now)
	}

	window.callsInWindow += 1
}

/**
 * Waits for a call slot on `source` and reserves it. Callers for the same
 * source are granted in arrival order; other sources are unaffected.
 */
export function acquire(source: string, config: RateLimitConfig): Promise<void> {
	const previous = queues.get(source) ?? Promise.resolve()
	const granted = previous.then(() => reserve(source, config))
	queues.set(source, granted)
	return granted
}

export function getRemaining(source: string, config: RateLimitConfig): number {
	const window = windows.get(source)
	if (!window) return config.maxRequests
	const now = Date.now()
	if (now - window.windowStart >= config.windowMs) return config.maxRequests
	return Math.max(0, config.maxRequests - window.callsInWindow)
}

export function resetWindow(source: string): void {
	windows.delete(source)
	queues.delete(source)
}
