import type { Page } from 'playwright';
import type { CropConfig, TimingConfig } from '../config/types.js';
import { EngineFailureError, InvalidArgumentError, errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import type { Position, Rect, Size } from '../types.js';
import { clamp, sleep, truncateText } from '../utils.js';
import type { BrowserSession } from '../viewport/browser-session.js';
import { captureElement, captureRegion, captureViewport, overlayGrid, upscale } from '../viewport/capture.js';
import {
	clampCropRect,
	clampFraction,
	clampZoom,
	isInsideViewport,
	relativeToRect,
	relativeToViewport,
} from './geometry.js';
import { locateMarkedElement, type LocatedElement } from './locator.js';
import type { Marker } from './marker.js';
import { observe, type Observation } from './observe.js';
import {
	assignTextInPage,
	describeElementInPage,
	type ElementDetails,
	scrollInPage,
	type ScrollDirection,
} from './page-scripts.js';

const logger = createLogger('interaction');

export const SCROLL_DIRECTIONS: readonly ScrollDirection[] = ['up', 'down', 'top', 'bottom'];

export type InputMethod = 'fill' | 'click+type' | 'js-value' | 'keyboard';

/** Pause between moving the pointer and pressing, like a person aiming. */
export const POINTER_SETTLE_MS = 100;
export const TYPE_DELAY_MS = 20;
export const WAIT_RANGE_S = { min: 1, max: 30 } as const;
const WAIT_IDLE_TIMEOUT_MS = 2_000;

export interface InteractionDeps {
	session: BrowserSession;
	marker: Marker;
	timing: Pick<TimingConfig, 'postActionWaitMs' | 'networkIdleTimeoutMs'>;
	crop: CropConfig;
}

export interface ActionOutcome {
	message: string;
	observation?: Observation;
	image?: Buffer;
	data?: Record<string, unknown>;
}

export function isScrollDirection(value: string): value is ScrollDirection {
	return SCROLL_DIRECTIONS.some((direction) => direction === value);
}

/**
 * Turns an element ID, pixel, fraction or region into a browser action and,
 * for anything that changes the page, follows up with a settle delay, a
 * best-effort network-idle wait and a fresh marking pass.
 */
export class InteractionResolver {
	private readonly deps: InteractionDeps;

	constructor(deps: InteractionDeps) {
		this.deps = deps;
	}

	// ── Pointer ──

	async click(id: number): Promise<ActionOutcome> {
		const page = this.page();
		const target = await locateMarkedElement(page, id);
		await target.handle.click();
		return this.afterMutation(page, `Clicked element ${id}.`);
	}

	async clickAt(x: number, y: number): Promise<ActionOutcome> {
		const page = this.page();
		const note = await this.pointAndClick(page, { x, y });
		return this.afterMutation(page, `Clicked at (${x}, ${y}).${note}`);
	}

	async clickRelative(rx: number, ry: number): Promise<ActionOutcome> {
		const page = this.page();
		const point = relativeToViewport(rx, ry, this.viewport(page));
		await this.pointAndClick(page, point);
		return this.afterMutation(
			page,
			`Clicked at relative (${clampFraction(rx)}, ${clampFraction(ry)}), pixel (${point.x}, ${point.y}).`,
		);
	}

	async clickInElement(id: number, rx: number, ry: number): Promise<ActionOutcome> {
		const page = this.page();
		const target = await locateMarkedElement(page, id);
		const rect = await this.boxOf(target, id);
		const point = relativeToRect(rect, rx, ry);
		await this.pointAndClick(page, point);
		return this.afterMutation(
			page,
			`Clicked element ${id} at relative (${clampFraction(rx)}, ${clampFraction(ry)}), ` +
				`pixel (${Math.round(point.x)}, ${Math.round(point.y)}).`,
		);
	}

	// ── Keyboard ──

	/** Types into element `id`, or at the current focus when no ID is given. */
	async input(id: number | undefined, text: string): Promise<ActionOutcome> {
		if (id === undefined) return this.typeAtFocus(text);

		const page = this.page();
		const target = await locateMarkedElement(page, id);
		const method = await this.enterText(page, target, text);
		const preview = truncateText(text, 50);
		return this.afterMutation(page, `Typed "${preview}" into element ${id} (${method}).`, { networkIdle: false });
	}

	async typeAtFocus(text: string): Promise<ActionOutcome> {
		const page = this.page();
		await page.keyboard.type(text, { delay: TYPE_DELAY_MS });
		return this.afterMutation(page, `Typed "${truncateText(text, 50)}" at the focused element.`, {
			networkIdle: false,
		});
	}

	async scroll(direction: string): Promise<ActionOutcome> {
		if (!isScrollDirection(direction)) {
			throw new InvalidArgumentError(
				`Unknown scroll direction "${direction}"; use one of ${SCROLL_DIRECTIONS.join(', ')}`,
			);
		}
		const page = this.page();
		await page.evaluate(scrollInPage, direction);
		return this.afterMutation(page, `Scrolled ${direction}.`, { networkIdle: false });
	}

	async wait(seconds: number): Promise<ActionOutcome> {
		const page = this.page();
		const waited = clamp(seconds, WAIT_RANGE_S.min, WAIT_RANGE_S.max);
		await sleep(waited * 1000);
		await this.waitForNetworkIdle(page, WAIT_IDLE_TIMEOUT_MS);
		const observation = await observe(page, this.deps.marker);
		return { message: `Waited ${waited}s.`, observation };
	}

	// ── Read-only ──

	async getElementInfo(id: number): Promise<ActionOutcome> {
		const page = this.page();
		const target = await locateMarkedElement(page, id);
		const details = await target.handle.evaluate(describeElementInPage);
		return {
			message: describeElement(id, details),
			data: { ...details, id, inputable: target.inputable, canvasLike: target.canvasLike },
		};
	}

	/** Best image URL the element carries: its source, poster, background or a child image. */
	async imageSource(id: number): Promise<string> {
		const target = await locateMarkedElement(this.page(), id);
		const details = await target.handle.evaluate(describeElementInPage);
		return details.imageUrl;
	}

	async screenshotElement(id: number): Promise<ActionOutcome> {
		const page = this.page();
		const target = await locateMarkedElement(page, id);
		const image = await captureElement(page, target.handle);
		return { message: `Captured element ${id} without tags.`, image };
	}

	async crop(region: Rect, zoom: number): Promise<ActionOutcome> {
		const page = this.page();
		const rect = clampCropRect(region, this.viewport(page));
		const factor = clampZoom(zoom, this.deps.crop);
		const image = await upscale(await captureRegion(page, rect), factor);
		return {
			message:
				`Cropped ${rect.width}x${rect.height} at (${rect.x}, ${rect.y}), zoom ${factor}x. ` +
				'Add the crop origin to positions in this image to get page coordinates.',
			image,
			data: { region: rect, zoom: factor },
		};
	}

	async grid(): Promise<ActionOutcome> {
		const page = this.page();
		const image = await overlayGrid(await captureViewport(page, { clean: true }));
		return {
			message: 'Gridlines mark every 0.1 of width and height; use them to pick relative click positions.',
			image,
		};
	}

	// ── Internals ──

	private page(): Page {
		return this.deps.session.requirePage();
	}

	private viewport(page: Page): Size {
		return page.viewportSize() ?? this.deps.session.viewportSize;
	}

	private async boxOf(target: LocatedElement, id: number): Promise<Rect> {
		const box = await target.handle.boundingBox();
		if (!box) {
			throw new InvalidArgumentError(`Element ${id} is not visible; scroll it into view or take a fresh screenshot`);
		}
		return box;
	}

	/** Moves, pauses, clicks. Returns a note when the point lies outside the viewport. */
	private async pointAndClick(page: Page, point: Position): Promise<string> {
		const viewport = this.viewport(page);
		let note = '';
		if (!isInsideViewport(point, viewport)) {
			logger.warn(`Click at (${point.x}, ${point.y}) is outside the ${viewport.width}x${viewport.height} viewport`);
			note = ` Note: the point is outside the ${viewport.width}x${viewport.height} viewport.`;
		}
		await page.mouse.move(point.x, point.y);
		await sleep(POINTER_SETTLE_MS);
		await page.mouse.click(point.x, point.y);
		return note;
	}

	/**
	 * Tries `fill` on input-capable elements, then click + select-all + typing,
	 * then assigning the value in the page. The first that works wins.
	 */
	private async enterText(page: Page, target: LocatedElement, text: string): Promise<InputMethod> {
		const failures: string[] = [];

		if (target.inputable) {
			try {
				await target.handle.fill(text);
				return 'fill';
			} catch (error) {
				failures.push(`fill: ${errorMessage(error)}`);
			}
		}

		try {
			await target.handle.click();
			await sleep(200);
			await page.keyboard.press('Control+A');
			await sleep(100);
			await page.keyboard.type(text, { delay: TYPE_DELAY_MS });
			return 'click+type';
		} catch (error) {
			failures.push(`click+type: ${errorMessage(error)}`);
		}

		try {
			const assigned = await target.handle.evaluate(assignTextInPage, text);
			if (assigned) return 'js-value';
			failures.push('js-value: element takes no value');
		} catch (error) {
			failures.push(`js-value: ${errorMessage(error)}`);
		}

		logger.debug(`Text entry failed: ${failures.join('; ')}`);
		throw new EngineFailureError(`Could not enter text: ${failures.join('; ')}`);
	}

	private async afterMutation(
		page: Page,
		message: string,
		options: { networkIdle?: boolean } = {},
	): Promise<ActionOutcome> {
		await sleep(this.deps.timing.postActionWaitMs);
		if (options.networkIdle ?? true) {
			await this.waitForNetworkIdle(page, this.deps.timing.networkIdleTimeoutMs);
		}
		const observation = await observe(page, this.deps.marker);
		return { message, observation };
	}

	private async waitForNetworkIdle(page: Page, timeoutMs: number): Promise<void> {
		if (timeoutMs <= 0) return;
		try {
			await page.waitForLoadState('networkidle', { timeout: timeoutMs });
		} catch (error) {
			logger.debug(`Network did not go idle within ${timeoutMs}ms: ${errorMessage(error)}`);
		}
	}
}

export function describeElement(id: number, details: ElementDetails): string {
	const lines = [`Element ${id}: <${details.tagName}>`];
	const text = details.text.replace(/\s+/g, ' ').trim();
	if (text) lines.push(`Text: ${truncateText(text, 100)}`);
	if (details.href) lines.push(`Link: ${details.href}`);
	if (details.src) lines.push(`Source: ${details.src}`);
	if (details.imageUrl && details.imageUrl !== details.src) lines.push(`Image: ${details.imageUrl}`);
	if (details.alt) lines.push(`Alt: ${details.alt}`);
	if (details.title) lines.push(`Title: ${details.title}`);
	if (details.placeholder) lines.push(`Placeholder: ${details.placeholder}`);
	if (details.value) lines.push(`Value: ${truncateText(details.value, 100)}`);
	if (details.type) lines.push(`Type: ${details.type}`);
	return lines.join('\n');
}
