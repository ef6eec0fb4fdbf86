import type { Position, Rect, Size } from '../types.js';
import { clamp } from '../utils.js';

export function clampFraction(value: number): number {
	return clamp(value, 0, 1);
}

export function isInsideViewport(point: Position, viewport: Size): boolean {
	return point.x >= 0 && point.y >= 0 && point.x <= viewport.width && point.y <= viewport.height;
}

/** Maps a 0–1 fraction of the viewport onto whole CSS pixels. */
export function relativeToViewport(rx: number, ry: number, viewport: Size): Position {
	return {
		x: Math.trunc(viewport.width * clampFraction(rx)),
		y: Math.trunc(viewport.height * clampFraction(ry)),
	};
}

/** Maps a 0–1 fraction of an element's box onto a page point. */
export function relativeToRect(rect: Rect, rx: number, ry: number): Position {
	return {
		x: rect.x + rect.width * clampFraction(rx),
		y: rect.y + rect.height * clampFraction(ry),
	};
}

/**
 * Pulls a crop rectangle inside the viewport: the origin is clamped to the
 * last pixel and the size is cut to what remains, never below one pixel.
 */
export function clampCropRect(region: Rect, viewport: Size): Rect {
	const x = clamp(Math.trunc(region.x), 0, Math.max(0, viewport.width - 1));
	const y = clamp(Math.trunc(region.y), 0, Math.max(0, viewport.height - 1));
	return {
		x,
		y,
		width: clamp(Math.trunc(region.width), 1, viewport.width - x),
		height: clamp(Math.trunc(region.height), 1, viewport.height - y),
	};
}

export function clampZoom(zoom: number, range: { minZoom: number; maxZoom: number }): number {
	return clamp(zoom, range.minZoom, range.maxZoom);
}
