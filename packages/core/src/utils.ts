import { nanoid } from 'nanoid';

// ── ID generation ──

export function generateId(size = 12): string {
	return nanoid(size);
}

// ── Numbers ──

export function clamp(value: number, min: number, max: number): number {
	if (Number.isNaN(value)) return min;
	return Math.min(max, Math.max(min, value));
}

// ── Text utilities ──

export function truncateText(text: string, maxLength: number, suffix = '...'): string {
	if (text.length <= maxLength) return text;
	return text.slice(0, maxLength) + suffix;
}

export function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ── Timing ──

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Serialization ──

/**
 * Minimal FIFO mutex. `run` queues `fn` behind every task submitted before it,
 * so at most one task is inside the critical section at a time.
 */
export class AsyncLock {
	private tail: Promise<void> = Promise.resolve();

	run<T>(fn: () => Promise<T>): Promise<T> {
		const result = this.tail.then(fn);
		this.tail = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}
}
