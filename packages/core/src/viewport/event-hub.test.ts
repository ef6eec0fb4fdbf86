import { describe, expect, test, vi } from 'vitest';
import { userId } from '../types.js';
import { EventHub } from './event-hub.js';
import type { SessionEventMap } from './events.js';

describe('EventHub', () => {
	test('delivers payloads to subscribers until they unsubscribe', () => {
		const hub = new EventHub<SessionEventMap>();
		const handler = vi.fn();

		const off = hub.on('session-reset', handler);
		hub.emit('session-reset', { reason: 'released' });
		off();
		hub.emit('session-reset', { reason: 'idle timeout' });

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith({ reason: 'released' });
	});

	test('once handlers fire a single time', () => {
		const hub = new EventHub<SessionEventMap>();
		const handler = vi.fn();

		hub.once('marks-rendered', handler);
		hub.emit('marks-rendered', { total: 3, frames: 1, failedFrames: 0 });
		hub.emit('marks-rendered', { total: 4, frames: 1, failedFrames: 0 });

		expect(handler).toHaveBeenCalledTimes(1);
	});

	test('a throwing handler does not stop the others', () => {
		const hub = new EventHub<SessionEventMap>();
		const after = vi.fn();
		hub.on('session-released', () => {
			throw new Error('boom');
		});
		hub.on('session-released', after);

		hub.emit('session-released', { userId: userId('alice') });

		expect(after).toHaveBeenCalledTimes(1);
	});

	test('history is capped and filterable', () => {
		const hub = new EventHub<SessionEventMap>({ maxHistory: 2 });

		hub.emit('session-reset', { reason: 'one' });
		hub.emit('navigation-completed', { url: 'https://example.com/', title: 'Example Domain' });
		hub.emit('session-reset', { reason: 'three' });

		expect(hub.getHistory().map((record) => record.event)).toEqual(['navigation-completed', 'session-reset']);
		expect(hub.getHistory('session-reset').map((record) => record.payload)).toEqual([{ reason: 'three' }]);
	});
});
