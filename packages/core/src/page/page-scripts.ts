/**
 * Functions serialized into the page with `frame.evaluate`. Each must be
 * self-contained: no imports, no closures over module scope and no named
 * inner helpers, since only the function's own source reaches the browser.
 */
import type { MarkMode } from '../config/types.js';
import type { CandidateElement, CandidateTier, FrameSnapshot, MarkCapability } from './types.js';

export const MARK_CLASS = 'ai-mark';
export const ID_ATTRIBUTE = 'data-ai-id';

export interface CollectArgs {
	mode: MarkMode;
}

export interface ApplyArgs {
	startId: number;
	marks: Array<{ key: number; capability: MarkCapability }>;
}

export interface AppliedMark {
	key: number;
	id: number;
	box: { left: number; top: number; width: number; height: number };
}

export interface ElementDetails {
	tagName: string;
	text: string;
	href: string;
	src: string;
	alt: string;
	title: string;
	placeholder: string;
	value: string;
	type: string;
	imageUrl: string;
}

export type TextAssignment = 'value' | 'innerText' | null;

/**
 * Clears the previous pass, gathers candidates in priority tiers and stamps
 * each with `data-ai-candidate` so the apply step can find it again.
 */
export function collectCandidatesInPage(args: CollectArgs): FrameSnapshot {
	document.querySelectorAll('.ai-mark').forEach((node) => node.remove());
	document.querySelectorAll('[data-ai-id]').forEach((node) => {
		node.removeAttribute('data-ai-id');
		node.removeAttribute('data-ai-inputable');
		node.removeAttribute('data-ai-canvas');
	});
	document.querySelectorAll('[data-ai-candidate]').forEach((node) => node.removeAttribute('data-ai-candidate'));

	const tiers: Array<[CandidateTier, string[]]> = [
		[
			'strong',
			[
				'a[href]',
				'button:not([disabled])',
				'input:not([type="hidden"]):not([disabled])',
				'textarea:not([disabled])',
				'select:not([disabled])',
				'[role="button"]',
				'[role="link"]',
				'[role="textbox"]',
				'[role="checkbox"]',
				'[role="radio"]',
				'[role="switch"]',
				'[role="menuitem"]',
				'[role="tab"]',
				'[role="option"]',
				'[role="slider"]',
				'[role="spinbutton"]',
				'[role="combobox"]',
				'[contenteditable="true"]',
			],
		],
		['event', ['[onclick]', '[onmousedown]', '[onmouseup]', '[tabindex]:not([tabindex="-1"])']],
		['special', ['canvas', 'svg', 'video', 'audio', 'img']],
	];

	const found = new Map<Element, CandidateTier>();
	for (const [tier, selectors] of tiers) {
		for (const selector of selectors) {
			document.querySelectorAll(selector).forEach((el) => {
				if (!found.has(el)) found.set(el, tier);
			});
		}
	}

	if (args.mode !== 'minimal') {
		document.querySelectorAll('*').forEach((el) => {
			if (!found.has(el) && window.getComputedStyle(el).cursor === 'pointer') {
				found.set(el, 'pointer');
			}
		});
	}

	const nonTextInputs = ['button', 'submit', 'reset', 'image', 'checkbox', 'radio', 'file', 'hidden'];
	const candidates: CandidateElement[] = [];
	let key = 0;

	found.forEach((tier, el) => {
		const rect = el.getBoundingClientRect();
		const style = window.getComputedStyle(el);
		const tag = el.tagName.toLowerCase();
		const role = el.getAttribute('role');
		const text = ((el instanceof HTMLElement ? el.innerText : el.textContent) ?? '').trim();

		let inputable = false;
		if (el instanceof HTMLInputElement) {
			inputable = !nonTextInputs.includes((el.type || 'text').toLowerCase());
		} else if (tag === 'textarea' || tag === 'select') {
			inputable = true;
		} else if (el.getAttribute('contenteditable') === 'true' || role === 'textbox') {
			inputable = true;
		}

		const tabAttr = el.getAttribute('tabindex');
		const tabIndex = tabAttr === null ? NaN : parseInt(tabAttr, 10);

		el.setAttribute('data-ai-candidate', String(key));
		candidates.push({
			key,
			tier,
			tag,
			role,
			text: text.replace(/\s+/g, ' ').slice(0, 80),
			textLength: text.length,
			hasAriaLabel: el.hasAttribute('aria-label'),
			tabIndex: Number.isNaN(tabIndex) ? null : tabIndex,
			hasOnClick: el.hasAttribute('onclick'),
			inputable,
			canvasLike: tag === 'canvas' || tag === 'svg',
			childCount: el.children.length,
			visible: style.visibility !== 'hidden' && style.display !== 'none' && parseFloat(style.opacity) !== 0,
			box: {
				left: rect.left,
				top: rect.top,
				right: rect.right,
				bottom: rect.bottom,
				width: rect.width,
				height: rect.height,
			},
		});
		key += 1;
	});

	return { viewport: { width: window.innerWidth, height: window.innerHeight }, candidates };
}

/**
 * Stamps IDs onto the selected candidates and renders a fixed-position tag
 * over each one. IDs are handed out in order to the candidates still present,
 * so the numbering stays contiguous even if the DOM changed since collection.
 */
export function applyMarksInPage(args: ApplyArgs): AppliedMark[] {
	const applied: AppliedMark[] = [];
	let nextId = args.startId;

	for (const mark of args.marks) {
		const el = document.querySelector(`[data-ai-candidate="${mark.key}"]`);
		if (!el) continue;

		const id = nextId;
		nextId += 1;
		el.setAttribute('data-ai-id', String(id));
		el.setAttribute('data-ai-inputable', mark.capability === 'inputable' ? 'true' : 'false');
		el.setAttribute('data-ai-canvas', mark.capability === 'canvasLike' ? 'true' : 'false');

		const rect = el.getBoundingClientRect();
		const label = document.createElement('div');
		label.className = 'ai-mark';
		label.textContent =
			mark.capability === 'inputable' ? `[${id}]` : mark.capability === 'canvasLike' ? `<${id}>` : String(id);
		const background =
			mark.capability === 'inputable'
				? 'rgba(34, 139, 34, 0.9)'
				: mark.capability === 'canvasLike'
					? 'rgba(30, 144, 255, 0.9)'
					: 'rgba(220, 20, 60, 0.9)';
		label.style.cssText = [
			'position: fixed',
			`left: ${rect.left}px`,
			`top: ${rect.top}px`,
			'z-index: 2147483647',
			`background-color: ${background}`,
			'color: white',
			'font-size: 12px',
			'padding: 1px 3px',
			'border-radius: 2px',
			'pointer-events: none',
			'border: 1px solid white',
			'font-family: sans-serif',
			'font-weight: bold',
			'line-height: 1.2',
		].join('; ');
		(document.body ?? document.documentElement).appendChild(label);

		applied.push({ key: mark.key, id, box: { left: rect.left, top: rect.top, width: rect.width, height: rect.height } });
	}

	document.querySelectorAll('[data-ai-candidate]').forEach((node) => node.removeAttribute('data-ai-candidate'));
	return applied;
}

/** Removes every tag and stamp a marking pass left in the frame. */
export function clearMarksInPage(): void {
	document.querySelectorAll('.ai-mark').forEach((node) => node.remove());
	document.querySelectorAll('[data-ai-id], [data-ai-candidate]').forEach((node) => {
		node.removeAttribute('data-ai-id');
		node.removeAttribute('data-ai-inputable');
		node.removeAttribute('data-ai-canvas');
		node.removeAttribute('data-ai-candidate');
	});
}

/** Shows or hides every rendered tag in the frame; returns how many were touched. */
export function setMarksVisibleInPage(visible: boolean): number {
	const labels = document.querySelectorAll<HTMLElement>('.ai-mark');
	labels.forEach((label) => {
		label.style.display = visible ? '' : 'none';
	});
	return labels.length;
}

/** Read-only description of a marked element, including the best image URL it carries. */
export function describeElementInPage(el: Element): ElementDetails {
	const text = (el instanceof HTMLElement ? el.innerText : el.textContent) ?? '';

	let rawImage = '';
	if (el instanceof HTMLImageElement) {
		rawImage = el.currentSrc || el.src;
	} else if (el instanceof HTMLVideoElement) {
		rawImage = el.poster;
	}
	if (!rawImage) {
		const source = el.querySelector('source[srcset]');
		rawImage = source?.getAttribute('srcset')?.split(',')[0]?.trim().split(/\s+/)[0] ?? '';
	}
	if (!rawImage) {
		const background = window.getComputedStyle(el).backgroundImage;
		const match = /url\(["']?(.*?)["']?\)/.exec(background);
		rawImage = match ? match[1] : '';
	}
	if (!rawImage) {
		rawImage = el.getAttribute('data-src') || el.getAttribute('data-original') || '';
	}
	if (!rawImage) {
		const child = el.querySelector('img');
		rawImage = child ? child.currentSrc || child.src || child.getAttribute('data-src') || '' : '';
	}

	let imageUrl = rawImage;
	if (rawImage && !rawImage.startsWith('data:')) {
		try {
			imageUrl = new URL(rawImage, document.baseURI).href;
		} catch {
			imageUrl = rawImage;
		}
	}

	return {
		tagName: el.tagName.toLowerCase(),
		text: text.trim(),
		href: el instanceof HTMLAnchorElement ? el.href : (el.getAttribute('href') ?? ''),
		src: el instanceof HTMLImageElement || el instanceof HTMLMediaElement ? el.src : (el.getAttribute('src') ?? ''),
		alt: el.getAttribute('alt') ?? '',
		title: el.getAttribute('title') ?? '',
		placeholder: el.getAttribute('placeholder') ?? '',
		value: el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement || el instanceof HTMLSelectElement ? el.value : '',
		type: el instanceof HTMLInputElement ? el.type : (el.getAttribute('type') ?? ''),
		imageUrl,
	};
}

/**
 * Last-resort text entry: assigns `value` (form controls) or `innerText`
 * (contenteditable) and fires the events frameworks listen for.
 */
export function assignTextInPage(el: Element, text: string): TextAssignment {
	if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement || el instanceof HTMLSelectElement) {
		el.value = text;
		el.dispatchEvent(new Event('input', { bubbles: true }));
		el.dispatchEvent(new Event('change', { bubbles: true }));
		return 'value';
	}
	if (el instanceof HTMLElement && el.getAttribute('contenteditable') === 'true') {
		el.innerText = text;
		el.dispatchEvent(new Event('input', { bubbles: true }));
		return 'innerText';
	}
	return null;
}

export type ScrollDirection = 'up' | 'down' | 'top' | 'bottom';

export function scrollInPage(direction: ScrollDirection): void {
	if (direction === 'up') window.scrollBy(0, -window.innerHeight);
	else if (direction === 'down') window.scrollBy(0, window.innerHeight);
	else if (direction === 'top') window.scrollTo(0, 0);
	else window.scrollTo(0, document.body ? document.body.scrollHeight : document.documentElement.scrollHeight);
}
