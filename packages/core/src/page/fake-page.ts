import type { Page } from 'playwright';
import type { Rect, Size } from '../types.js';
import {
	applyMarksInPage,
	assignTextInPage,
	collectCandidatesInPage,
	describeElementInPage,
	type ElementDetails,
	scrollInPage,
	setMarksVisibleInPage,
} from './page-scripts.js';

/**
 * In-process stand-in for a Playwright page, for tests. It answers the page
 * functions this package evaluates and records every action in `log`.
 */

export interface FakeElement {
	id: number;
	inputable?: boolean;
	canvas?: boolean;
	box?: Rect | null;
	details?: Partial<ElementDetails>;
	failFill?: boolean;
	failClick?: boolean;
	/** Result of the in-page value assignment; `null` means the element takes no value. */
	assigns?: 'value' | 'innerText' | null;
}

export interface FakePageOptions {
	url?: string;
	title?: string;
	viewport?: Size | null;
	elements?: FakeElement[];
	/** Elements living in a child frame. */
	frameElements?: FakeElement[];
	networkIdleFails?: boolean;
	screenshot?: Buffer;
	devicePixelRatio?: number;
}

export interface FakePage {
	page: Page;
	log: string[];
	close(): void;
}

const EMPTY_DETAILS: ElementDetails = {
	tagName: 'div',
	text: '',
	href: '',
	src: '',
	alt: '',
	title: '',
	placeholder: '',
	value: '',
	type: '',
	imageUrl: '',
};

export function createFakePage(options: FakePageOptions = {}): FakePage {
	const log: string[] = [];
	const viewport = options.viewport === undefined ? { width: 1280, height: 720 } : options.viewport;
	const image = options.screenshot ?? Buffer.from('png');
	let closed = false;

	const handle = (el: FakeElement) => ({
		getAttribute: async (name: string) => {
			if (name === 'data-ai-inputable') return el.inputable ? 'true' : 'false';
			if (name === 'data-ai-canvas') return el.canvas ? 'true' : 'false';
			return null;
		},
		click: async () => {
			log.push(`element.click ${el.id}`);
			if (el.failClick) throw new Error('Element is not visible');
		},
		fill: async (text: string) => {
			log.push(`element.fill ${el.id} ${text}`);
			if (el.failFill) throw new Error('Element is not an <input>');
		},
		boundingBox: async () => (el.box === undefined ? { x: 0, y: 0, width: 100, height: 50 } : el.box),
		evaluate: async (fn: unknown, arg?: unknown) => {
			if (fn === describeElementInPage) return { ...EMPTY_DETAILS, ...el.details };
			if (fn === assignTextInPage) {
				log.push(`element.assign ${el.id} ${String(arg)}`);
				return el.assigns === undefined ? 'value' : el.assigns;
			}
			throw new Error('unexpected element function');
		},
		screenshot: async (shotOptions: unknown) => {
			log.push(`element.screenshot ${el.id} ${JSON.stringify(shotOptions)}`);
			return image;
		},
	});

	const frame = (url: string, elements: FakeElement[], parent: unknown) => ({
		url: () => url,
		name: () => '',
		isDetached: () => false,
		parentFrame: () => parent,
		$: async (selector: string) => {
			const match = /data-ai-id="(\d+)"/.exec(selector);
			const found = match ? elements.find((el) => el.id === Number(match[1])) : undefined;
			return found ? handle(found) : null;
		},
		evaluate: async (fn: unknown, arg?: unknown) => {
			if (fn === collectCandidatesInPage) return { viewport: viewport ?? { width: 0, height: 0 }, candidates: [] };
			if (fn === applyMarksInPage) return [];
			if (fn === setMarksVisibleInPage) {
				log.push(arg ? 'marks.show' : 'marks.hide');
				return 0;
			}
			throw new Error('unexpected frame function');
		},
	});

	const main = frame(options.url ?? 'https://example.com/', options.elements ?? [], null);
	const frames = [main];
	if (options.frameElements) {
		frames.push(frame('https://example.com/embed', options.frameElements, main));
	}

	const page = {
		frames: () => frames,
		mainFrame: () => main,
		url: () => options.url ?? 'https://example.com/',
		title: async () => options.title ?? 'Example Domain',
		isClosed: () => closed,
		close: async () => {
			closed = true;
		},
		viewportSize: () => viewport,
		mouse: {
			move: async (x: number, y: number) => {
				log.push(`mouse.move ${x},${y}`);
			},
			click: async (x: number, y: number) => {
				log.push(`mouse.click ${x},${y}`);
			},
		},
		keyboard: {
			press: async (key: string) => {
				log.push(`keyboard.press ${key}`);
			},
			type: async (text: string) => {
				log.push(`keyboard.type ${text}`);
			},
		},
		evaluate: async (fn: unknown, arg?: unknown) => {
			if (fn === scrollInPage) {
				log.push(`scroll ${String(arg)}`);
				return undefined;
			}
			return {
				width: viewport?.width ?? 0,
				height: viewport?.height ?? 0,
				devicePixelRatio: options.devicePixelRatio ?? 1,
			};
		},
		waitForLoadState: async (state: string) => {
			log.push(`wait ${state}`);
			if (options.networkIdleFails) throw new Error('Timeout 5000ms exceeded');
		},
		screenshot: async (shotOptions: unknown) => {
			log.push(`page.screenshot ${JSON.stringify(shotOptions)}`);
			return image;
		},
		goto: async (url: string) => {
			log.push(`goto ${url}`);
			return null;
		},
	};

	return {
		page: page as unknown as Page,
		log,
		close: () => {
			closed = true;
		},
	};
}
