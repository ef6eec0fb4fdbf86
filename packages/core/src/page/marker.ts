import type { Frame, Page } from 'playwright';
import type { MarkingConfig } from '../config/types.js';
import { MarkingFailedError, errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import { timed } from '../telemetry.js';
import { elementId, err, ok, type Result } from '../types.js';
import type { EventHub } from '../viewport/event-hub.js';
import type { SessionEventMap } from '../viewport/events.js';
import { applyMarksInPage, clearMarksInPage, collectCandidatesInPage } from './page-scripts.js';
import { selectMarks } from './select-marks.js';
import type { FrameError, FrameMarking, FrameRef, MarkedElement, MarkingOptions, MarkingReport } from './types.js';

const logger = createLogger('marker');

export function frameRef(frame: Frame, index: number): FrameRef {
	return {
		index,
		name: frame.name(),
		url: frame.url(),
		isMain: frame.parentFrame() === null,
	};
}

/**
 * Runs a marking pass over the main document and every attached sub-frame.
 * Each frame is collected in the page, selected in Node and then stamped,
 * with a running offset so IDs are unique and contiguous across the pass.
 */
export class Marker {
	private readonly config: MarkingConfig;
	private readonly events?: EventHub<SessionEventMap>;

	constructor(config: MarkingConfig, events?: EventHub<SessionEventMap>) {
		this.config = config;
		this.events = events;
	}

	options(startId: number): MarkingOptions {
		return {
			startId,
			maxMarks: this.config.maxMarks,
			minArea: this.config.minArea,
			iouThreshold: this.config.iouThreshold,
			mode: this.config.mode,
			containmentMargin: this.config.containmentMargin,
		};
	}

	async markPage(page: Page, startId = 0): Promise<MarkingReport> {
		const { result } = await timed('marking.pass', () => this.markFrames(page.frames(), startId));
		return result;
	}

	async markFrames(frames: readonly Frame[], startId = 0): Promise<MarkingReport> {
		const results: FrameMarking[] = [];
		const elements: MarkedElement[] = [];
		let nextId = startId;

		for (const [index, frame] of frames.entries()) {
			if (frame.isDetached()) continue;

			const ref = frameRef(frame, index);
			const outcome = await this.markFrame(frame, ref, nextId);
			results.push({ frame: ref, outcome });

			if (outcome.ok) {
				elements.push(...outcome.value);
				nextId += outcome.value.length;
			} else {
				logger.debug(`Skipping frame ${ref.index} (${ref.url}): ${outcome.error.message}`);
				nextId += outcome.error.reservedIds;
				this.events?.emit('frame-failed', { frameUrl: ref.url, message: outcome.error.message });
			}
		}

		const failed = results.filter((r) => !r.outcome.ok);
		if (results.length > 0 && failed.length === results.length) {
			const first = failed[0].outcome;
			throw new MarkingFailedError(
				`Marking failed in every frame (${failed.length})`,
				{ cause: first.ok ? undefined : first.error.cause },
			);
		}

		this.events?.emit('marks-rendered', {
			total: elements.length,
			frames: results.length,
			failedFrames: failed.length,
		});

		return {
			elements,
			frames: results,
			total: elements.length,
			failedFrames: failed.length,
			nextId,
		};
	}

	async markFrame(frame: Frame, ref: FrameRef, startId: number): Promise<Result<MarkedElement[], FrameError>> {
		let planned = 0;
		try {
			const options = this.options(startId);
			const snapshot = await frame.evaluate(collectCandidatesInPage, { mode: options.mode });
			const { marks, stats } = selectMarks(snapshot, options);
			planned = marks.length;
			const applied = await frame.evaluate(applyMarksInPage, {
				startId,
				marks: marks.map((mark) => ({ key: mark.key, capability: mark.capability })),
			});

			const byKey = new Map(marks.map((mark) => [mark.key, mark]));
			const elements: MarkedElement[] = [];
			for (const { key, id, box } of applied) {
				const plan = byKey.get(key);
				if (!plan) continue;
				elements.push({
					id: elementId(id),
					frame: ref,
					rect: { x: box.left, y: box.top, width: box.width, height: box.height },
					capability: plan.capability,
					score: plan.score,
					tag: plan.tag,
					text: plan.text,
				});
			}

			logger.debug(
				`Frame ${ref.index}: ${stats.collected} collected, ${stats.eligible} eligible, ` +
					`${stats.suppressed} suppressed, ${stats.truncated} truncated, ${elements.length} marked`,
			);
			return ok(elements);
		} catch (error) {
			const reservedIds = planned > 0 ? await this.clearFrame(frame, ref, planned) : 0;
			return err({ frame: ref, message: errorMessage(error), reservedIds, cause: error });
		}
	}

	/** Undoes a partial pass; returns how many IDs stay reserved if the frame cannot be cleared. */
	private async clearFrame(frame: Frame, ref: FrameRef, planned: number): Promise<number> {
		try {
			await frame.evaluate(clearMarksInPage);
			return 0;
		} catch (error) {
			logger.warn(`Could not clear partial marks in frame ${ref.index}; skipping ${planned} IDs: ${errorMessage(error)}`);
			return planned;
		}
	}
}
