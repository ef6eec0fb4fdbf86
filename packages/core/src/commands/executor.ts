import type { BrowserController } from '../controller/controller.js';
import type { OperationResult } from '../controller/types.js';
import { classifyError, errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import type { UserId } from '../types.js';
import { CommandCatalog } from './catalog/catalog.js';
import type { CatalogOptions } from './catalog/types.js';
import {
	ClickAtToolSchema,
	ClickInElementToolSchema,
	ClickRelativeToolSchema,
	ClickToolSchema,
	ConfirmScreenshotToolSchema,
	CropToolSchema,
	ElementToolSchema,
	EmptyToolSchema,
	InputToolSchema,
	OpenToolSchema,
	ScreenshotToolSchema,
	ScrollToolSchema,
	SendImageToolSchema,
	WaitToolSchema,
} from './types.js';

const logger = createLogger('executor');

/**
 * Binds the browser tools to a controller. Tool names here are bare
 * (`open`, `click_xy`); the MCP bridge adds the `browser_` prefix.
 */
export class CommandExecutor {
	readonly catalog: CommandCatalog;
	private readonly controller: BrowserController;

	constructor(controller: BrowserController, options?: CatalogOptions) {
		this.controller = controller;
		this.catalog = new CommandCatalog(options);
		this.registerBuiltinTools();
	}

	/** Runs a tool for `userId`. Bad arguments and unknown tools come back as failed results. */
	async execute(name: string, args: unknown, userId: UserId): Promise<OperationResult> {
		try {
			return await this.catalog.execute(name, args, { controller: this.controller, userId });
		} catch (error) {
			const kind = classifyError(error);
			logger.debug(`Tool ${name} rejected (${kind}): ${errorMessage(error)}`);
			return { ok: false, message: errorMessage(error), errorKind: kind };
		}
	}

	private registerBuiltinTools(): void {
		// Navigation
		this.catalog.register({
			name: 'open',
			description:
				'Open a URL and return a screenshot with numbered tags on interactive elements. ' +
				'Private, loopback and cloud metadata addresses are refused.',
			schema: OpenToolSchema,
			handler: ({ url }, ctx) => ctx.controller.navigate(ctx.userId, url),
		});

		// Pointer
		this.catalog.register({
			name: 'click',
			description: 'Click the element with the given tag ID.',
			schema: ClickToolSchema,
			handler: ({ elementId }, ctx) => ctx.controller.click(ctx.userId, elementId),
		});

		this.catalog.register({
			name: 'click_xy',
			description: 'Click at a CSS pixel position in the viewport. Use when the target has no tag.',
			schema: ClickAtToolSchema,
			handler: ({ x, y }, ctx) => ctx.controller.clickAt(ctx.userId, x, y),
		});

		this.catalog.register({
			name: 'click_relative',
			description: 'Click at a position given as fractions of the viewport width and height.',
			schema: ClickRelativeToolSchema,
			handler: ({ relativeX, relativeY }, ctx) => ctx.controller.clickRelative(ctx.userId, relativeX, relativeY),
		});

		this.catalog.register({
			name: 'click_in_element',
			description:
				'Click inside a tagged element at fractions of its width and height, e.g. a spot on a canvas or map.',
			schema: ClickInElementToolSchema,
			handler: ({ elementId, relativeX, relativeY }, ctx) =>
				ctx.controller.clickInElement(ctx.userId, elementId, relativeX, relativeY),
		});

		// Keyboard, scroll, wait
		this.catalog.register({
			name: 'input',
			description: 'Type text into a tagged element, or at the focused element when no ID is given.',
			schema: InputToolSchema,
			handler: ({ elementId, text }, ctx) => ctx.controller.input(ctx.userId, elementId, text),
		});

		this.catalog.register({
			name: 'scroll',
			description: 'Scroll the page up or down by one viewport, or jump to the top or bottom.',
			schema: ScrollToolSchema,
			handler: ({ direction }, ctx) => ctx.controller.scroll(ctx.userId, direction),
		});

		this.catalog.register({
			name: 'wait',
			description: 'Wait for the page to change, then return a fresh screenshot.',
			schema: WaitToolSchema,
			handler: ({ seconds }, ctx) => ctx.controller.wait(ctx.userId, seconds),
		});

		// Inspection
		this.catalog.register({
			name: 'get_link',
			description: 'Describe a tagged element: its text, link target, image source and form attributes.',
			schema: ElementToolSchema,
			handler: ({ elementId }, ctx) => ctx.controller.getElementInfo(ctx.userId, elementId),
		});

		this.catalog.register({
			name: 'view_image',
			description: 'Capture a tagged element on its own, without tags drawn over it.',
			schema: ElementToolSchema,
			handler: ({ elementId }, ctx) => ctx.controller.screenshotElement(ctx.userId, elementId),
		});

		this.catalog.register({
			name: 'crop',
			description: 'Capture a region of the viewport and magnify it to read small text or details.',
			schema: CropToolSchema,
			handler: ({ x, y, width, height, zoom }, ctx) =>
				ctx.controller.crop(ctx.userId, { x, y, width, height }, zoom),
		});

		this.catalog.register({
			name: 'grid',
			description: 'Capture the viewport with gridlines at every tenth, to estimate relative click positions.',
			schema: EmptyToolSchema,
			handler: (_params, ctx) => ctx.controller.grid(ctx.userId),
		});

		// Screenshots for the user
		this.catalog.register({
			name: 'screenshot',
			description:
				'Prepare a screenshot to show the user. It is held until confirmed with confirm_screenshot.',
			schema: ScreenshotToolSchema,
			handler: ({ clean }, ctx) => ctx.controller.requestUserScreenshot(ctx.userId, clean),
		});

		this.catalog.register({
			name: 'confirm_screenshot',
			description: 'Send or discard the screenshot prepared by the screenshot tool.',
			schema: ConfirmScreenshotToolSchema,
			handler: ({ action }, ctx) => ctx.controller.confirmUserScreenshot(ctx.userId, action),
		});

		this.catalog.register({
			name: 'send_image',
			description:
				'Send images to the user, by URL or by the ID of an element that shows one. ' +
				'Every URL passes the same safety checks as a page.',
			schema: SendImageToolSchema,
			handler: ({ imageUrls, elementIds }, ctx) =>
				ctx.controller.sendImages(ctx.userId, { urls: imageUrls, elementIds }),
		});

		// Lifecycle
		this.catalog.register({
			name: 'close',
			description: 'Close the browser and release it for other users.',
			schema: EmptyToolSchema,
			handler: (_params, ctx) => ctx.controller.close(ctx.userId),
		});
	}
}
