import type { Page } from 'playwright';
import sharp from 'sharp';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import { setMarksVisibleInPage } from '../page/page-scripts.js';
import type { Rect } from '../types.js';

const logger = createLogger('capture');

/**
 * Every capture goes through these options: PNG at CSS scale, so image
 * pixels line up with the coordinates clicks and crops use on any DPR.
 */
export const CAPTURE_OPTIONS = { type: 'png', scale: 'css' } as const;

/** Anything that can take a CSS-scale PNG: a page or an element handle. */
export interface Capturable {
	screenshot(options: typeof CAPTURE_OPTIONS & { clip?: Rect }): Promise<Buffer>;
}

export function shoot(target: Capturable, clip?: Rect): Promise<Buffer> {
	return target.screenshot(clip ? { ...CAPTURE_OPTIONS, clip } : { ...CAPTURE_OPTIONS });
}

export async function setMarksVisible(page: Page, visible: boolean): Promise<number> {
	let touched = 0;
	for (const frame of page.frames()) {
		if (frame.isDetached()) continue;
		try {
			touched += await frame.evaluate(setMarksVisibleInPage, visible);
		} catch (error) {
			logger.debug(`Could not ${visible ? 'show' : 'hide'} marks in ${frame.url()}: ${errorMessage(error)}`);
		}
	}
	return touched;
}

/** Runs `fn` with every tag hidden across all frames and restores them afterwards. */
export async function withMarksHidden<T>(page: Page, fn: () => Promise<T>): Promise<T> {
	await setMarksVisible(page, false);
	try {
		return await fn();
	} finally {
		await setMarksVisible(page, true);
	}
}

export async function captureViewport(page: Page, options: { clean?: boolean } = {}): Promise<Buffer> {
	if (options.clean) {
		return withMarksHidden(page, () => shoot(page));
	}
	return shoot(page);
}

export function captureRegion(page: Page, region: Rect): Promise<Buffer> {
	return shoot(page, region);
}

export function captureElement(page: Page, element: Capturable): Promise<Buffer> {
	return withMarksHidden(page, () => shoot(element));
}

// ── Post-processing ──

export interface ImageSize {
	width: number;
	height: number;
}

export async function imageSize(png: Buffer): Promise<ImageSize> {
	const { width, height } = await sharp(png).metadata();
	return { width: width ?? 0, height: height ?? 0 };
}

/** Upsamples with a Lanczos kernel; a zoom of 1 or less returns the input. */
/** Re-encodes any image sharp can read as PNG. */
export function toPng(image: Buffer): Promise<Buffer> {
	return sharp(image).png().toBuffer();
}

export async function upscale(png: Buffer, zoom: number): Promise<Buffer> {
	if (zoom <= 1) return png;
	const { width, height } = await imageSize(png);
	return sharp(png)
		.resize(Math.round(width * zoom), Math.round(height * zoom), { kernel: sharp.kernel.lanczos3 })
		.png()
		.toBuffer();
}

export const GRID_STYLE = {
	stroke: 'rgba(255, 0, 0, 0.5)',
	strokeWidth: 2,
	labelColor: 'rgb(255, 0, 0)',
} as const;

/** SVG of the relative gridlines, one line and label per `step`. */
export function gridSvg(size: ImageSize, step = 0.1): string {
	const count = Math.round(1 / step);
	const fontSize = Math.max(12, Math.round(Math.min(size.width, size.height) * 0.02));
	const lines: string[] = [];
	const labels: string[] = [];

	for (let i = 1; i < count; i++) {
		const label = (i * step).toFixed(1);
		const x = Math.round(size.width * i * step);
		const y = Math.round(size.height * i * step);
		lines.push(
			`<line x1="${x}" y1="0" x2="${x}" y2="${size.height}" />`,
			`<line x1="0" y1="${y}" x2="${size.width}" y2="${y}" />`,
		);
		labels.push(`<text x="${x + 2}" y="${fontSize}">${label}</text>`, `<text x="2" y="${y - 2}">${label}</text>`);
	}

	return [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}">`,
		`<g stroke="${GRID_STYLE.stroke}" stroke-width="${GRID_STYLE.strokeWidth}">`,
		...lines,
		'</g>',
		`<g fill="${GRID_STYLE.labelColor}" font-family="sans-serif" font-size="${fontSize}">`,
		...labels,
		'</g>',
		'</svg>',
	].join('');
}

export async function overlayGrid(png: Buffer, step = 0.1): Promise<Buffer> {
	const size = await imageSize(png);
	return sharp(png)
		.composite([{ input: Buffer.from(gridSvg(size, step)), top: 0, left: 0 }])
		.png()
		.toBuffer();
}
