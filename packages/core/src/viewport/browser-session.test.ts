import type { Browser, LaunchOptions } from 'playwright';
import { describe, expect, test, vi } from 'vitest';
import { BrowserConfigSchema } from '../config/types.js';
import { LaunchFailedError, SessionClosedError } from '../errors.js';
import { userId } from '../types.js';
import { BrowserSession, type BrowserLauncher } from './browser-session.js';

// ── Helpers ──

function fakeBrowser(options: { failClose?: boolean } = {}) {
	const pages: Array<{ closed: boolean }> = [];
	const contexts: Array<{ viewport: unknown; closed: boolean }> = [];

	const browser = {
		isConnected: () => true,
		on: vi.fn(),
		close: vi.fn(async () => {
			if (options.failClose) throw new Error('Browser has been closed');
		}),
		newContext: vi.fn(async (contextOptions: { viewport: unknown }) => {
			const context = { viewport: contextOptions.viewport, closed: false };
			contexts.push(context);
			return {
				newPage: async () => {
					const state = { closed: false };
					pages.push(state);
					return {
						isClosed: () => state.closed,
						close: async () => {
							state.closed = true;
						},
					};
				},
				close: async () => {
					context.closed = true;
				},
			};
		}),
	};

	return { browser: browser as unknown as Browser, raw: browser, pages, contexts };
}

function session(launcher: BrowserLauncher) {
	return new BrowserSession({
		browser: BrowserConfigSchema.parse({ executablePath: '/opt/chrome' }),
		viewport: { width: 1280, height: 720 },
		launcher,
	});
}

// ── Tests ──

describe('BrowserSession', () => {
	test('launches lazily with the configured profile and reuses the page', async () => {
		const fake = fakeBrowser();
		const launcher = vi.fn(async (_options: LaunchOptions) => fake.browser);
		const s = session(launcher);

		expect(launcher).not.toHaveBeenCalled();
		expect(s.isOpen).toBe(false);

		const first = await s.ensurePage();
		const second = await s.ensurePage();

		expect(first).toBe(second);
		expect(launcher).toHaveBeenCalledTimes(1);
		expect(launcher.mock.calls[0][0]).toMatchObject({ headless: true, executablePath: '/opt/chrome' });
		expect(fake.contexts[0].viewport).toEqual({ width: 1280, height: 720 });
	});

	test('requirePage fails before anything is opened', () => {
		const s = session(async () => fakeBrowser().browser);
		expect(() => s.requirePage()).toThrow(SessionClosedError);
	});

	test('a viewport change rebuilds page and context but keeps the browser', async () => {
		const fake = fakeBrowser();
		const launcher = vi.fn(async () => fake.browser);
		const s = session(launcher);
		await s.ensurePage();

		await s.setViewport({ width: 800, height: 600 });
		expect(fake.pages[0].closed).toBe(true);
		expect(fake.contexts[0].closed).toBe(true);
		expect(() => s.requirePage()).toThrow(SessionClosedError);

		await s.ensurePage();
		expect(launcher).toHaveBeenCalledTimes(1);
		expect(fake.contexts[1].viewport).toEqual({ width: 800, height: 600 });
	});

	test('setting the same viewport is a no-op', async () => {
		const fake = fakeBrowser();
		const s = session(async () => fake.browser);
		await s.ensurePage();
		await s.setViewport({ width: 1280, height: 720 });
		expect(s.isOpen).toBe(true);
	});

	test('reset closes everything, ignores close errors and drops the pending screenshot', async () => {
		const fake = fakeBrowser({ failClose: true });
		const s = session(async () => fake.browser);
		await s.ensurePage();
		s.setPending({
			id: 'shot-1',
			userId: userId('alice'),
			image: Buffer.from('png'),
			title: 'Example',
			url: 'https://example.com/',
			clean: false,
			createdAt: 0,
		});

		await expect(s.reset()).resolves.toBeUndefined();

		expect(fake.raw.close).toHaveBeenCalledTimes(1);
		expect(fake.pages[0].closed).toBe(true);
		expect(s.pending).toBeNull();
		expect(s.isOpen).toBe(false);
	});

	test('a launch failure surfaces as LaunchFailedError', async () => {
		const s = session(async () => {
			throw new Error('Executable does not exist');
		});
		const failure = s.ensurePage();
		await expect(failure).rejects.toBeInstanceOf(LaunchFailedError);
		await expect(failure).rejects.toThrow('Failed to start browser: Executable does not exist');
	});
});
