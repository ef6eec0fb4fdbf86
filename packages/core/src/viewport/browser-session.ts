import { chromium, type Browser, type BrowserContext, type LaunchOptions, type Page } from 'playwright';
import type { BrowserConfig, ViewportConfig } from '../config/types.js';
import { LaunchFailedError, SessionClosedError, errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import { timed } from '../telemetry.js';
import type { Size, UserId } from '../types.js';
import { EventHub } from './event-hub.js';
import type { SessionEventMap } from './events.js';
import { LaunchProfile } from './launch-profile.js';

const logger = createLogger('browser-session');

/** A screenshot held back until the user who asked for it confirms delivery. */
export interface PendingScreenshot {
	id: string;
	userId: UserId;
	image: Buffer;
	title: string;
	url: string;
	clean: boolean;
	createdAt: number;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<Browser>;

export interface BrowserSessionOptions {
	browser: BrowserConfig;
	viewport: ViewportConfig;
	events?: EventHub<SessionEventMap>;
	/** Defaults to launching Playwright's bundled Chromium. */
	launcher?: BrowserLauncher;
}

/**
 * Owns the one browser, its context and page. Everything is created on first
 * use; a viewport change rebuilds the page and context but keeps the browser
 * process.
 */
export class BrowserSession {
	readonly events: EventHub<SessionEventMap>;

	private browser: Browser | null = null;
	private context: BrowserContext | null = null;
	private page: Page | null = null;
	private pendingShot: PendingScreenshot | null = null;
	private viewport: Size;

	private readonly browserConfig: BrowserConfig;
	private readonly launcher: BrowserLauncher;

	constructor(options: BrowserSessionOptions) {
		this.browserConfig = options.browser;
		this.viewport = { width: options.viewport.width, height: options.viewport.height };
		this.events = options.events ?? new EventHub({ maxHistory: 200 });
		this.launcher = options.launcher ?? ((launchOptions) => chromium.launch(launchOptions));
	}

	get isOpen(): boolean {
		return this.page !== null && !this.page.isClosed();
	}

	get viewportSize(): Size {
		return { ...this.viewport };
	}

	/** The live page; throws `SessionClosedError` when nothing has been opened. */
	requirePage(): Page {
		if (!this.page || this.page.isClosed()) {
			throw new SessionClosedError();
		}
		return this.page;
	}

	async ensurePage(): Promise<Page> {
		if (this.page && !this.page.isClosed()) return this.page;

		try {
			const { result } = await timed('browser-session.start', () => this.open());
			return result;
		} catch (error) {
			await this.reset();
			throw new LaunchFailedError(`Failed to start browser: ${errorMessage(error)}`, { cause: error });
		}
	}

	/**
	 * Changes the viewport. A live page cannot be resized reliably, so the
	 * page and context are closed and rebuilt on next use.
	 */
	async setViewport(size: Size): Promise<void> {
		if (size.width === this.viewport.width && size.height === this.viewport.height) return;

		this.viewport = { width: size.width, height: size.height };
		if (this.context) {
			logger.info(`Viewport changed to ${size.width}x${size.height}, recreating page`);
			await this.closePageAndContext();
		}
	}

	/** Closes page, context and browser. Close errors are logged, not thrown. */
	async reset(): Promise<void> {
		this.pendingShot = null;
		await this.closePageAndContext();

		const browser = this.browser;
		this.browser = null;
		if (browser) {
			try {
				await browser.close();
			} catch (error) {
				logger.debug(`Error closing browser: ${errorMessage(error)}`);
			}
			logger.info('Browser closed');
		}
	}

	// ── Pending outbound screenshot ──

	get pending(): PendingScreenshot | null {
		return this.pendingShot;
	}

	setPending(shot: PendingScreenshot): void {
		if (this.pendingShot) {
			logger.debug(`Replacing pending screenshot ${this.pendingShot.id}`);
		}
		this.pendingShot = shot;
	}

	clearPending(): void {
		this.pendingShot = null;
	}

	// ── Internals ──

	private async open(): Promise<Page> {
		const browser = await this.ensureBrowser();
		if (!this.context) {
			this.context = await browser.newContext({
				viewport: { ...this.viewport },
				userAgent: this.browserConfig.userAgent,
			});
		}

		this.page = await this.context.newPage();
		return this.page;
	}

	private async ensureBrowser(): Promise<Browser> {
		if (this.browser && this.browser.isConnected()) return this.browser;

		const launchOptions = LaunchProfile.fromConfig(this.browserConfig).build();
		logger.info(`Launching chromium (headless: ${launchOptions.headless ?? true})`);
		const browser = await this.launcher(launchOptions);
		browser.on('disconnected', () => {
			if (this.browser !== browser) return;
			logger.warn('Browser disconnected');
			this.browser = null;
			this.context = null;
			this.page = null;
		});
		this.browser = browser;
		return browser;
	}

	private async closePageAndContext(): Promise<void> {
		const page = this.page;
		const context = this.context;
		this.page = null;
		this.context = null;

		if (page) {
			try {
				await page.close();
			} catch (error) {
				logger.debug(`Error closing page: ${errorMessage(error)}`);
			}
		}
		if (context) {
			try {
				await context.close();
			} catch (error) {
				logger.debug(`Error closing context: ${errorMessage(error)}`);
			}
		}
	}
}
