import sharp from 'sharp';
import { describe, expect, test } from 'vitest';
import { CropConfigSchema, MarkingConfigSchema } from '../config/types.js';
import { ElementNotFoundError, EngineFailureError, InvalidArgumentError } from '../errors.js';
import type { BrowserSession } from '../viewport/browser-session.js';
import { imageSize } from '../viewport/capture.js';
import { createFakePage, type FakePageOptions } from './fake-page.js';
import { describeElement, InteractionResolver } from './interaction.js';
import { Marker } from './marker.js';

// ── Helpers ──

const CSS_PNG = '{"type":"png","scale":"css"}';

function setup(options: FakePageOptions = {}) {
	const fake = createFakePage(options);
	const session = {
		requirePage: () => fake.page,
		viewportSize: { width: 1280, height: 720 },
	} as unknown as BrowserSession;
	const resolver = new InteractionResolver({
		session,
		marker: new Marker(MarkingConfigSchema.parse({})),
		timing: { postActionWaitMs: 0, networkIdleTimeoutMs: 5_000 },
		crop: CropConfigSchema.parse({}),
	});
	return { resolver, log: fake.log };
}

function solidPng(width: number, height: number): Promise<Buffer> {
	return sharp({ create: { width, height, channels: 3, background: { r: 0, g: 0, b: 0 } } })
		.png()
		.toBuffer();
}

// ── Tests ──

describe('click by element ID', () => {
	test('clicks, waits for the network and re-marks', async () => {
		const { resolver, log } = setup({ elements: [{ id: 3 }] });

		const outcome = await resolver.click(3);

		expect(outcome.message).toBe('Clicked element 3.');
		expect(outcome.observation?.title).toBe('Example Domain');
		expect(log).toEqual(['element.click 3', 'wait networkidle', `page.screenshot ${CSS_PNG}`]);
	});

	test('finds elements inside sub-frames', async () => {
		const { resolver, log } = setup({ elements: [{ id: 0 }], frameElements: [{ id: 7 }] });
		await resolver.click(7);
		expect(log[0]).toBe('element.click 7');
	});

	test('an unknown ID is NotFound', async () => {
		const { resolver } = setup({ elements: [{ id: 1 }] });
		await expect(resolver.click(99)).rejects.toBeInstanceOf(ElementNotFoundError);
	});

	test('a network that never goes idle does not fail the click', async () => {
		const { resolver } = setup({ elements: [{ id: 1 }], networkIdleFails: true });
		await expect(resolver.click(1)).resolves.toMatchObject({ message: 'Clicked element 1.' });
	});
});

describe('click by coordinates', () => {
	test('absolute clicks move first and warn outside the viewport', async () => {
		const { resolver, log } = setup();

		const outcome = await resolver.clickAt(2000, 50);

		expect(outcome.message).toBe('Clicked at (2000, 50). Note: the point is outside the 1280x720 viewport.');
		expect(log.slice(0, 2)).toEqual(['mouse.move 2000,50', 'mouse.click 2000,50']);
	});

	test('relative clicks are clamped and converted to pixels', async () => {
		const { resolver, log } = setup();

		const outcome = await resolver.clickRelative(0.5, 1.5);

		expect(outcome.message).toBe('Clicked at relative (0.5, 1), pixel (640, 720).');
		expect(log[1]).toBe('mouse.click 640,720');
	});

	test('element-relative clicks map onto the bounding box', async () => {
		const { resolver, log } = setup({ elements: [{ id: 4, canvas: true, box: { x: 100, y: 200, width: 300, height: 100 } }] });

		const outcome = await resolver.clickInElement(4, 0.5, 0.5);

		expect(outcome.message).toBe('Clicked element 4 at relative (0.5, 0.5), pixel (250, 250).');
		expect(log[1]).toBe('mouse.click 250,250');
	});

	test('element-relative clicks need a visible box', async () => {
		const { resolver } = setup({ elements: [{ id: 4, box: null }] });
		await expect(resolver.clickInElement(4, 0.5, 0.5)).rejects.toBeInstanceOf(InvalidArgumentError);
	});
});

describe('text input', () => {
	test('fills input-capable elements directly', async () => {
		const { resolver, log } = setup({ elements: [{ id: 1, inputable: true }] });

		const outcome = await resolver.input(1, 'hello');

		expect(outcome.message).toBe('Typed "hello" into element 1 (fill).');
		expect(log).toEqual(['element.fill 1 hello', `page.screenshot ${CSS_PNG}`]);
	});

	test('falls back to click and typing when fill fails', async () => {
		const { resolver, log } = setup({ elements: [{ id: 1, inputable: true, failFill: true }] });

		const outcome = await resolver.input(1, 'hello');

		expect(outcome.message).toBe('Typed "hello" into element 1 (click+type).');
		expect(log.slice(0, 4)).toEqual([
			'element.fill 1 hello',
			'element.click 1',
			'keyboard.press Control+A',
			'keyboard.type hello',
		]);
	});

	test('assigns the value in the page as a last resort', async () => {
		const { resolver, log } = setup({ elements: [{ id: 2, failClick: true }] });

		const outcome = await resolver.input(2, 'hello');

		expect(outcome.message).toBe('Typed "hello" into element 2 (js-value).');
		expect(log.slice(0, 2)).toEqual(['element.click 2', 'element.assign 2 hello']);
	});

	test('reports failure when no method works', async () => {
		const { resolver } = setup({ elements: [{ id: 2, failClick: true, assigns: null }] });
		await expect(resolver.input(2, 'hello')).rejects.toBeInstanceOf(EngineFailureError);
	});

	test('types at the focused element when no ID is given', async () => {
		const { resolver, log } = setup();

		const outcome = await resolver.input(undefined, 'query');

		expect(outcome.message).toBe('Typed "query" at the focused element.');
		expect(log[0]).toBe('keyboard.type query');
	});
});

describe('scroll and wait', () => {
	test('scrolls without waiting for the network', async () => {
		const { resolver, log } = setup();
		await resolver.scroll('down');
		expect(log).toEqual(['scroll down', `page.screenshot ${CSS_PNG}`]);
	});

	test('rejects unknown directions', async () => {
		const { resolver } = setup();
		await expect(resolver.scroll('sideways')).rejects.toThrow(
			'Unknown scroll direction "sideways"; use one of up, down, top, bottom',
		);
	});

	test('wait is clamped to at least one second', async () => {
		const { resolver, log } = setup();
		const outcome = await resolver.wait(0);
		expect(outcome.message).toBe('Waited 1s.');
		expect(log[0]).toBe('wait networkidle');
	});
});

describe('read-only operations', () => {
	test('getElementInfo describes the element without acting on it', async () => {
		const { resolver, log } = setup({
			elements: [{ id: 5, details: { tagName: 'a', text: 'Read the docs', href: 'https://example.com/docs' } }],
		});

		const outcome = await resolver.getElementInfo(5);

		expect(outcome.message).toBe('Element 5: <a>\nText: Read the docs\nLink: https://example.com/docs');
		expect(outcome.data).toMatchObject({ id: 5, href: 'https://example.com/docs', inputable: false });
		expect(outcome.observation).toBeUndefined();
		expect(log).toEqual([]);
	});

	test('screenshotElement hides tags around the capture', async () => {
		const { resolver, log } = setup({ elements: [{ id: 2 }] });
		const outcome = await resolver.screenshotElement(2);
		expect(outcome.image).toBeInstanceOf(Buffer);
		expect(log).toEqual(['marks.hide', `element.screenshot 2 ${CSS_PNG}`, 'marks.show']);
	});

	test('crop clamps the region and zoom, then upsamples', async () => {
		const { resolver, log } = setup({ screenshot: await solidPng(100, 50) });

		const outcome = await resolver.crop({ x: 1250, y: 10, width: 100, height: 40 }, 3);

		expect(outcome.data).toEqual({ region: { x: 1250, y: 10, width: 30, height: 40 }, zoom: 3 });
		expect(outcome.message).toContain('Cropped 30x40 at (1250, 10), zoom 3x.');
		expect(log).toEqual([
			'page.screenshot {"type":"png","scale":"css","clip":{"x":1250,"y":10,"width":30,"height":40}}',
		]);
		expect(await imageSize(outcome.image ?? Buffer.alloc(0))).toEqual({ width: 300, height: 150 });
	});

	test('crop zoom is capped at the configured maximum', async () => {
		const { resolver } = setup({ screenshot: await solidPng(10, 10) });
		const outcome = await resolver.crop({ x: 0, y: 0, width: 10, height: 10 }, 9);
		expect(outcome.data).toMatchObject({ zoom: 4 });
	});

	test('grid captures a clean viewport', async () => {
		const { resolver, log } = setup({ screenshot: await solidPng(64, 32) });
		const outcome = await resolver.grid();
		expect(log).toEqual(['marks.hide', `page.screenshot ${CSS_PNG}`, 'marks.show']);
		expect(await imageSize(outcome.image ?? Buffer.alloc(0))).toEqual({ width: 64, height: 32 });
	});
});

describe('describeElement', () => {
	test('truncates long text and lists present attributes only', () => {
		const text = 'x'.repeat(120);
		const description = describeElement(1, {
			tagName: 'img',
			text,
			href: '',
			src: 'https://example.com/a.png',
			alt: 'A chart',
			title: '',
			placeholder: '',
			value: '',
			type: '',
			imageUrl: 'https://example.com/a.png',
		});
		expect(description).toBe(
			`Element 1: <img>\nText: ${'x'.repeat(100)}...\nSource: https://example.com/a.png\nAlt: A chart`,
		);
	});
});
