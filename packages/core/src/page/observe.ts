import type { Page } from 'playwright';
import type { Size } from '../types.js';
import { captureViewport } from '../viewport/capture.js';
import type { Marker } from './marker.js';
import type { MarkingReport } from './types.js';

/** What the agent gets back after every mutation: fresh tags and the image they sit on. */
export interface Observation {
	url: string;
	title: string;
	image: Buffer;
	report: MarkingReport;
	viewport: Size;
	devicePixelRatio: number;
}

export async function observe(page: Page, marker: Marker): Promise<Observation> {
	const report = await marker.markPage(page);
	const image = await captureViewport(page);
	const [title, metrics] = await Promise.all([
		page.title(),
		page.evaluate(() => ({
			width: window.innerWidth,
			height: window.innerHeight,
			devicePixelRatio: window.devicePixelRatio,
		})),
	]);

	return {
		url: page.url(),
		title,
		image,
		report,
		viewport: { width: metrics.width, height: metrics.height },
		devicePixelRatio: metrics.devicePixelRatio,
	};
}

export function describeObservation(observation: Observation): string {
	const { report, viewport, devicePixelRatio } = observation;
	const frames = report.frames.length === 1 ? '1 frame' : `${report.frames.length} frames`;
	const skipped = report.failedFrames > 0 ? ` (${report.failedFrames} skipped)` : '';
	return (
		`${report.total} elements marked across ${frames}${skipped}. ` +
		`Viewport ${viewport.width}x${viewport.height} CSS px, DPR ${devicePixelRatio}; ` +
		'screenshot coordinates are CSS pixels.'
	);
}
