import type { LaunchOptions } from 'playwright';
import type { BrowserConfig } from '../config/types.js';

/**
 * Flags needed to run Chromium inside a container or CI sandbox.
 */
export const CONTAINER_FLAGS = [
	'--no-sandbox',
	'--disable-setuid-sandbox',
	'--disable-dev-shm-usage',
	'--disable-accelerated-2d-canvas',
	'--no-zygote',
	'--disable-gpu',
];

/**
 * Standard automation flags that turn off background noise and first-run UI.
 */
export const CHROME_AUTOMATION_FLAGS = [
	'--no-first-run',
	'--no-default-browser-check',
	'--disable-background-networking',
	'--disable-breakpad',
	'--disable-component-update',
	'--disable-default-apps',
	'--disable-sync',
	'--disable-translate',
	'--metrics-recording-only',
	'--no-pings',
	'--password-store=basic',
	'--use-mock-keychain',
	'--force-color-profile=srgb',
];

/**
 * Builder for Chromium launch options.
 */
export class LaunchProfile {
	private _headless = true;
	private _containerMode = true;
	private _executablePath?: string;
	private _extraArgs: string[] = [];

	static create(): LaunchProfile {
		return new LaunchProfile();
	}

	static fromConfig(browser: BrowserConfig): LaunchProfile {
		const profile = LaunchProfile.create()
			.headless(browser.headless)
			.containerMode(browser.containerMode)
			.extraArgs(...browser.extraArgs);
		if (browser.executablePath) {
			profile.executablePath(browser.executablePath);
		}
		return profile;
	}

	headless(value = true): this {
		this._headless = value;
		return this;
	}

	containerMode(value = true): this {
		this._containerMode = value;
		return this;
	}

	executablePath(path: string): this {
		this._executablePath = path;
		return this;
	}

	extraArgs(...args: string[]): this {
		this._extraArgs = [...this._extraArgs, ...args];
		return this;
	}

	build(): LaunchOptions {
		const args = [...CHROME_AUTOMATION_FLAGS];

		if (this._containerMode) {
			args.push(...CONTAINER_FLAGS);
		}

		// User extra args (last, so they can override)
		args.push(...this._extraArgs);

		return {
			headless: this._headless,
			executablePath: this._executablePath,
			args: [...new Set(args)],
		};
	}
}
