import { config as loadDotenv } from 'dotenv';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { type TagsightConfig, type TagsightConfigInput, TagsightConfigSchema } from './types.js';
import { createLogger } from '../logging.js';

const logger = createLogger('config');

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseNumber(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === '') return undefined;
	const parsed = Number(value);
	return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
	if (value === undefined) return undefined;
	const normalized = value.trim().toLowerCase();
	if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
	if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
	return undefined;
}

function parseList(value: string | undefined): string[] | undefined {
	if (value === undefined) return undefined;
	return value
		.split(',')
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

/** Drops undefined leaves so they never shadow a lower-priority source. */
function compact(obj: PlainObject): PlainObject {
	const result: PlainObject = {};
	for (const [key, value] of Object.entries(obj)) {
		if (value === undefined) continue;
		if (isPlainObject(value)) {
			const nested = compact(value);
			if (Object.keys(nested).length > 0) result[key] = nested;
		} else {
			result[key] = value;
		}
	}
	return result;
}

export function deepMerge(...objects: PlainObject[]): PlainObject {
	const result: PlainObject = {};

	for (const obj of objects) {
		for (const [key, value] of Object.entries(obj)) {
			const existing = result[key];
			if (isPlainObject(value) && isPlainObject(existing)) {
				result[key] = deepMerge(existing, value);
			} else if (value !== undefined) {
				result[key] = value;
			}
		}
	}

	return result;
}

export interface ConfigLoadOptions {
	/** Programmatic overrides, highest priority */
	overrides?: TagsightConfigInput;
	/** Explicit config file; defaults to TAGSIGHT_CONFIG or ~/.tagsight/config.json */
	configFile?: string;
	/** Environment to read; defaults to process.env after loading .env */
	env?: NodeJS.ProcessEnv;
}

/**
 * Resolved, validated configuration. Sources are merged as
 * defaults ← environment ← config file ← overrides.
 */
export class Config {
	readonly config: TagsightConfig;

	private constructor(config: TagsightConfig) {
		this.config = config;
	}

	static load(options: ConfigLoadOptions = {}): Config {
		let env = options.env;
		if (!env) {
			loadDotenv();
			env = process.env;
		}

		const filePath = options.configFile ?? env.TAGSIGHT_CONFIG ?? Config.defaultConfigFilePath;
		const merged = deepMerge(
			Config.fromEnv(env),
			Config.loadConfigFile(filePath),
			isPlainObject(options.overrides) ? options.overrides : {},
		);

		return new Config(TagsightConfigSchema.parse(merged));
	}

	/** Builds a config from defaults and overrides only, ignoring env and files. */
	static from(overrides: TagsightConfigInput = {}): Config {
		return new Config(TagsightConfigSchema.parse(overrides));
	}

	static fromEnv(env: NodeJS.ProcessEnv): PlainObject {
		return compact({
			session: {
				idleTimeoutMs: parseNumber(env.TAGSIGHT_IDLE_TIMEOUT_MS),
			},
			viewport: {
				width: parseNumber(env.TAGSIGHT_VIEWPORT_WIDTH),
				height: parseNumber(env.TAGSIGHT_VIEWPORT_HEIGHT),
			},
			browser: {
				headless: parseBoolean(env.TAGSIGHT_HEADLESS),
				executablePath: env.TAGSIGHT_BROWSER_PATH || undefined,
				containerMode: parseBoolean(env.TAGSIGHT_CONTAINER_MODE),
			},
			marking: {
				mode: env.TAGSIGHT_MARK_MODE || undefined,
				maxMarks: parseNumber(env.TAGSIGHT_MAX_MARKS),
			},
			security: {
				allowPrivateNetwork: parseBoolean(env.TAGSIGHT_ALLOW_PRIVATE_NETWORK),
				allowedDomains: parseList(env.TAGSIGHT_ALLOWED_DOMAINS),
				blockedDomains: parseList(env.TAGSIGHT_BLOCKED_DOMAINS),
			},
		});
	}

	static get defaultConfigFilePath(): string {
		return path.join(os.homedir(), '.tagsight', 'config.json');
	}

	static loadConfigFile(filePath: string): PlainObject {
		if (!fs.existsSync(filePath)) return {};

		try {
			const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
			if (!isPlainObject(parsed)) {
				logger.warn(`Ignoring config file ${filePath}: top level is not an object`);
				return {};
			}
			logger.debug(`Loaded config from ${filePath}`);
			return parsed;
		} catch (error) {
			logger.warn(`Failed to load config file ${filePath}: ${error}`);
			return {};
		}
	}

	get session() {
		return this.config.session;
	}

	get viewport() {
		return this.config.viewport;
	}

	get browser() {
		return this.config.browser;
	}

	get marking() {
		return this.config.marking;
	}

	get security() {
		return this.config.security;
	}

	get timing() {
		return this.config.timing;
	}

	get crop() {
		return this.config.crop;
	}
}
