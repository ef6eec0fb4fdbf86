import type { Page, Route } from 'playwright';
import { describe, expect, test, vi } from 'vitest';
import { MarkingConfigSchema } from '../config/types.js';
import { NavigationFailedError, RedirectBlockedError, SecurityRejectionError } from '../errors.js';
import { Marker } from '../page/marker.js';
import { UrlValidator } from '../security/url-validator.js';
import type { BrowserSession } from './browser-session.js';
import { EventHub } from './event-hub.js';
import type { SessionEventMap } from './events.js';
import { Navigator } from './navigator.js';

// ── Helpers ──

const DNS: Record<string, string[]> = {
	'example.com': ['93.184.215.14'],
	'www.example.com': ['93.184.215.14'],
	'rebind.example': ['10.0.0.5'],
};

interface Script {
	/** Navigation requests the server redirects through after the first one. */
	redirects?: string[];
	/** URL the page reports once loaded; defaults to the last hop. */
	landsOn?: string;
	failWith?: Error;
	/** Main-frame navigation the page starts on its own once loaded (meta refresh, script). */
	duringSettle?: string;
}

function fakePage(script: Script = {}) {
	const mainFrame = {};
	let handler: ((route: Route) => Promise<void>) | null = null;
	let current = 'about:blank';
	const aborted: string[] = [];

	const send = async (url: string): Promise<boolean> => {
		if (!handler) return true;
		let allowed = true;
		const route = {
			request: () => ({ isNavigationRequest: () => true, url: () => url, frame: () => mainFrame }),
			continue: async () => {},
			abort: async () => {
				allowed = false;
				aborted.push(url);
			},
		};
		await handler(route as unknown as Route);
		return allowed;
	};

	const page = {
		mainFrame: () => mainFrame,
		route: vi.fn(async (_pattern: string, fn: (route: Route) => Promise<void>) => {
			handler = fn;
		}),
		unroute: vi.fn(async () => {
			handler = null;
		}),
		goto: vi.fn(async (url: string) => {
			if (url === 'about:blank') {
				current = url;
				return null;
			}
			const hops = [url, ...(script.redirects ?? [])];
			for (const hop of hops) {
				if (!(await send(hop))) throw new Error(`net::ERR_BLOCKED_BY_CLIENT at ${hop}`);
			}
			if (script.failWith) throw script.failWith;
			current = script.landsOn ?? hops[hops.length - 1];
			const late = script.duringSettle;
			if (late) {
				setTimeout(() => {
					void send(late).then((allowed) => {
						if (allowed) current = late;
					});
				}, 0);
			}
			return null;
		}),
		url: () => current,
		title: async () => 'Example Domain',
		evaluate: async () => ({ width: 1280, height: 720, devicePixelRatio: 2 }),
		screenshot: vi.fn(async () => Buffer.from('png')),
		frames: () => [],
	};

	return { page, aborted };
}

function setup(script: Script = {}, validator?: UrlValidator) {
	const { page, aborted } = fakePage(script);
	const events = new EventHub<SessionEventMap>();
	const ensurePage = vi.fn(async () => page as unknown as Page);
	const session = {
		events,
		ensurePage,
		requirePage: () => page as unknown as Page,
	} as unknown as BrowserSession;

	const navigator = new Navigator({
		session,
		validator: validator ?? new UrlValidator({ resolver: async (host) => DNS[host] ?? [] }),
		marker: new Marker(MarkingConfigSchema.parse({})),
		timing: { navigationTimeoutMs: 30_000, navigationSettleMs: script.duringSettle ? 50 : 0 },
	});

	return { navigator, page, aborted, events, ensurePage };
}

// ── Tests ──

describe('Navigator.navigate', () => {
	test('opens a public page, returning the observation and removing the guard', async () => {
		const { navigator, page } = setup({ landsOn: 'https://example.com/' });

		const result = await navigator.navigate('example.com');

		expect(result.requestedUrl).toBe('https://example.com');
		expect(result.url).toBe('https://example.com/');
		expect(result.title).toBe('Example Domain');
		expect(result.devicePixelRatio).toBe(2);
		expect(page.goto).toHaveBeenCalledWith('https://example.com', {
			waitUntil: 'domcontentloaded',
			timeout: 30_000,
		});
		expect(page.screenshot).toHaveBeenCalledWith({ type: 'png', scale: 'css' });
		expect(page.unroute).toHaveBeenCalledTimes(1);
	});

	test('rejects an unsafe URL before touching the browser', async () => {
		const { navigator, ensurePage } = setup();

		const failure = navigator.navigate('http://169.254.169.254/latest/meta-data/');

		await expect(failure).rejects.toBeInstanceOf(SecurityRejectionError);
		await expect(failure).rejects.toThrow('Blocked by security policy: cloud metadata endpoint 169.254.169.254');
		expect(ensurePage).not.toHaveBeenCalled();
	});

	test('follows a safe redirect chain', async () => {
		const { navigator } = setup({ redirects: ['https://www.example.com/home'] });
		const result = await navigator.navigate('https://example.com/');
		expect(result.url).toBe('https://www.example.com/home');
	});

	test('aborts a redirect into a private network and reports it distinctly', async () => {
		const { navigator, page, aborted, events } = setup({
			redirects: ['https://www.example.com/next', 'http://127.0.0.1:8080/admin'],
		});

		const failure = navigator.navigate('https://example.com/');

		await expect(failure).rejects.toBeInstanceOf(RedirectBlockedError);
		await expect(failure).rejects.toMatchObject({
			url: 'https://example.com/',
			blockedUrl: 'http://127.0.0.1:8080/admin',
		});
		expect(aborted).toEqual(['http://127.0.0.1:8080/admin']);
		expect(events.getHistory('navigation-blocked')).toHaveLength(1);
		expect(page.unroute).toHaveBeenCalledTimes(1);
	});

	test('blocks a hop whose hostname resolves to a private address', async () => {
		const { navigator } = setup({ redirects: ['https://rebind.example/'] });
		await expect(navigator.navigate('https://example.com/')).rejects.toThrow(
			'Unsafe redirect blocked: https://rebind.example/ (rebind.example resolves to reserved IPv4 address 10.0.0.5 (private-use, 10.0.0.0/8))',
		);
	});

	test('re-validates the URL the page finally landed on', async () => {
		const { navigator, page } = setup({ landsOn: 'http://localhost:3000/' });

		await expect(navigator.navigate('https://example.com/')).rejects.toMatchObject({
			name: 'RedirectBlockedError',
			blockedUrl: 'http://localhost:3000/',
		});
		expect(page.goto).toHaveBeenLastCalledWith('about:blank');
	});

	test('keeps guarding while the page settles', async () => {
		const { navigator, page, aborted } = setup({
			landsOn: 'https://example.com/',
			duringSettle: 'http://169.254.169.254/latest/meta-data/',
		});

		await expect(navigator.navigate('https://example.com/')).rejects.toMatchObject({
			name: 'RedirectBlockedError',
			blockedUrl: 'http://169.254.169.254/latest/meta-data/',
		});
		expect(aborted).toEqual(['http://169.254.169.254/latest/meta-data/']);
		expect(page.unroute).toHaveBeenCalledTimes(1);
	});

	test('a validator that throws blocks the hop', async () => {
		const validate = vi
			.fn<UrlValidator['validate']>()
			.mockResolvedValueOnce({ safe: true, reason: 'ok' })
			.mockRejectedValueOnce(new Error('resolver exploded'));
		const validator = { validate } as unknown as UrlValidator;
		const { navigator } = setup({}, validator);

		await expect(navigator.navigate('https://example.com/')).rejects.toMatchObject({
			name: 'RedirectBlockedError',
			reason: 'validation failed: resolver exploded',
		});
	});

	test('an ordinary load failure is a NavigationFailedError', async () => {
		const { navigator, page } = setup({ failWith: new Error('net::ERR_NAME_NOT_RESOLVED') });

		const failure = navigator.navigate('https://example.com/');

		await expect(failure).rejects.toBeInstanceOf(NavigationFailedError);
		await expect(failure).rejects.not.toBeInstanceOf(RedirectBlockedError);
		expect(page.unroute).toHaveBeenCalledTimes(1);
	});
});
