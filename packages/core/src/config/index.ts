export { Config, deepMerge, type ConfigLoadOptions } from './config.js';
export {
	type TagsightConfig,
	type TagsightConfigInput,
	TagsightConfigSchema,
	type MarkMode,
	MarkModeSchema,
	type ViewportConfig,
	type BrowserConfig,
	type MarkingConfig,
	type SecurityConfig,
	type TimingConfig,
	type CropConfig,
} from './types.js';
