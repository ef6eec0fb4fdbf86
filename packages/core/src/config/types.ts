import { z } from 'zod';

export const MarkModeSchema = z.enum(['minimal', 'balanced', 'all']);
export type MarkMode = z.infer<typeof MarkModeSchema>;

export const SessionConfigSchema = z.object({
	idleTimeoutMs: z.number().int().positive().default(180_000),
});

export const ViewportConfigSchema = z.object({
	width: z.number().int().min(200).max(7680).default(1280),
	height: z.number().int().min(200).max(4320).default(720),
});

export type ViewportConfig = z.infer<typeof ViewportConfigSchema>;

export const BrowserConfigSchema = z.object({
	headless: z.boolean().default(true),
	executablePath: z.string().optional(),
	userAgent: z
		.string()
		.default(
			'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
		),
	extraArgs: z.array(z.string()).default([]),
	/** Sandbox-less flags for running inside containers. */
	containerMode: z.boolean().default(true),
});

export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;

export const MarkingConfigSchema = z.object({
	mode: MarkModeSchema.default('balanced'),
	maxMarks: z.number().int().positive().default(80),
	minArea: z.number().nonnegative().default(400),
	iouThreshold: z.number().min(0).max(1).default(0.6),
	containmentMargin: z.number().nonnegative().default(20),
});

export type MarkingConfig = z.infer<typeof MarkingConfigSchema>;

export const SecurityConfigSchema = z.object({
	allowPrivateNetwork: z.boolean().default(false),
	allowedDomains: z.array(z.string()).default([]),
	blockedDomains: z.array(z.string()).default([]),
});

export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;

export const TimingConfigSchema = z.object({
	postActionWaitMs: z.number().int().nonnegative().default(500),
	userScreenshotWaitMs: z.number().int().nonnegative().default(500),
	navigationTimeoutMs: z.number().int().positive().default(30_000),
	networkIdleTimeoutMs: z.number().int().nonnegative().default(5_000),
	navigationSettleMs: z.number().int().nonnegative().default(1_000),
	imageDownloadTimeoutMs: z.number().int().positive().default(30_000),
});

export type TimingConfig = z.infer<typeof TimingConfigSchema>;

export const CropConfigSchema = z
	.object({
		minZoom: z.number().positive().default(1),
		maxZoom: z.number().positive().default(4),
	})
	.refine((crop) => crop.minZoom <= crop.maxZoom, {
		message: 'minZoom must not exceed maxZoom',
	});

export type CropConfig = z.infer<typeof CropConfigSchema>;

export const TagsightConfigSchema = z.object({
	session: SessionConfigSchema.default({}),
	viewport: ViewportConfigSchema.default({}),
	browser: BrowserConfigSchema.default({}),
	marking: MarkingConfigSchema.default({}),
	security: SecurityConfigSchema.default({}),
	timing: TimingConfigSchema.default({}),
	crop: CropConfigSchema.default({}),
});

export type TagsightConfig = z.infer<typeof TagsightConfigSchema>;

/** Shape accepted from config files and programmatic overrides. */
export type TagsightConfigInput = z.input<typeof TagsightConfigSchema>;
