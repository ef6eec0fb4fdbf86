import { z } from 'zod';
import type { BrowserController } from '../controller/controller.js';
import type { UserId } from '../types.js';

/** Who a tool call acts for and what it acts on. */
export interface ToolContext {
	controller: BrowserController;
	userId: UserId;
}

// ── Shared fields ──

const ElementIdField = z.number().int().nonnegative().describe('Element ID from a tag on the latest screenshot');
const FractionField = z.number().describe('Fraction from 0.0 to 1.0; values outside are clamped');

// ── Tool argument schemas ──

export const OpenToolSchema = z.object({
	url: z.string().min(1).describe('URL to open; https:// is assumed when no scheme is given'),
});

export const ClickToolSchema = z.object({
	elementId: ElementIdField,
});

export const ClickAtToolSchema = z.object({
	x: z.number().describe('Horizontal CSS pixel from the left edge of the viewport'),
	y: z.number().describe('Vertical CSS pixel from the top edge of the viewport'),
});

export const ClickRelativeToolSchema = z.object({
	relativeX: FractionField,
	relativeY: FractionField,
});

export const ClickInElementToolSchema = z.object({
	elementId: ElementIdField,
	relativeX: FractionField,
	relativeY: FractionField,
});

export const InputToolSchema = z.object({
	elementId: ElementIdField.optional().describe('Element to type into; omit to type at the focused element'),
	text: z.string().describe('Text to enter'),
});

export const ScrollToolSchema = z.object({
	direction: z.enum(['up', 'down', 'top', 'bottom']).describe('Scroll by one viewport, or to either end of the page'),
});

export const WaitToolSchema = z.object({
	seconds: z.number().default(3).describe('Seconds to wait, between 1 and 30'),
});

export const ElementToolSchema = z.object({
	elementId: ElementIdField,
});

export const CropToolSchema = z.object({
	x: z.number().describe('Left edge of the region in CSS pixels'),
	y: z.number().describe('Top edge of the region in CSS pixels'),
	width: z.number().positive().describe('Region width in CSS pixels'),
	height: z.number().positive().describe('Region height in CSS pixels'),
	zoom: z.number().default(2).describe('Magnification factor'),
});

export const ScreenshotToolSchema = z.object({
	clean: z.boolean().default(false).describe('Hide the element tags in the screenshot'),
});

export const ConfirmScreenshotToolSchema = z.object({
	action: z.enum(['send', 'cancel']).describe('Send the pending screenshot to the user, or discard it'),
});

export const SendImageToolSchema = z.object({
	imageUrls: z.array(z.string().min(1)).optional().describe('Image URLs to send'),
	elementIds: z
		.array(ElementIdField)
		.optional()
		.describe('Elements whose image to send: an img source, a video poster, a background or a child image'),
});

export const EmptyToolSchema = z.object({});
