import type { ElementHandle, Frame, Page } from 'playwright';
import { ElementNotFoundError, errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import { ID_ATTRIBUTE } from './page-scripts.js';

const logger = createLogger('locator');

export interface LocatedElement {
	frame: Frame;
	handle: ElementHandle<HTMLElement | SVGElement>;
	/** Stamped input-capable during the marking pass. */
	inputable: boolean;
	canvasLike: boolean;
}

export function markSelector(id: number): string {
	return `[${ID_ATTRIBUTE}="${id}"]`;
}

/**
 * Finds the element carrying `id` from the latest marking pass, searching the
 * main document first and then every attached sub-frame. Frames that cannot
 * be queried are skipped.
 */
export async function locateMarkedElement(page: Page, id: number): Promise<LocatedElement> {
	const selector = markSelector(id);

	for (const frame of page.frames()) {
		if (frame.isDetached()) continue;

		let handle: ElementHandle<HTMLElement | SVGElement> | null;
		try {
			handle = await frame.$(selector);
		} catch (error) {
			logger.debug(`Could not query frame ${frame.url()}: ${errorMessage(error)}`);
			continue;
		}
		if (!handle) continue;

		const [inputable, canvas] = await Promise.all([
			handle.getAttribute('data-ai-inputable'),
			handle.getAttribute('data-ai-canvas'),
		]);
		return { frame, handle, inputable: inputable === 'true', canvasLike: canvas === 'true' };
	}

	throw new ElementNotFoundError(id);
}
