import { lookup } from 'node:dns/promises';
import type { SecurityConfig } from '../config/types.js';
import { createLogger } from '../logging.js';
import { escapeRegExp } from '../utils.js';
import { classifyIp, ipFamily, unbracket } from './ip-ranges.js';

const logger = createLogger('url-validator');

export interface ValidationVerdict {
	safe: boolean;
	reason: string;
}

/** Resolves a hostname to every A and AAAA address it has. */
export type HostResolver = (hostname: string) => Promise<string[]>;

export interface UrlValidatorOptions {
	allowPrivateNetwork?: boolean;
	allowedDomains?: string[];
	blockedDomains?: string[];
	resolver?: HostResolver;
}

const ALLOWED_SCHEMES = new Set(['http:', 'https:']);

/** Loopback aliases, cloud metadata services and in-cluster service names. */
const DANGEROUS_HOSTNAMES = new Set([
	'localhost',
	'localhost.localdomain',
	'ip6-localhost',
	'ip6-loopback',
	'metadata.google.internal',
	'metadata.goog',
	'kubernetes.default',
	'kubernetes.default.svc',
	'kubernetes.default.svc.cluster.local',
]);

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;

export const resolveAllAddresses: HostResolver = async (hostname) => {
	const entries = await lookup(hostname, { all: true, verbatim: true });
	return entries.map((entry) => entry.address);
};

/**
 * Compiles a domain glob such as "*.internal.example". `*` matches any run of
 * characters, dots included; the match is anchored and case-insensitive.
 */
export function compileDomainPattern(pattern: string): RegExp {
	const source = escapeRegExp(pattern.trim().toLowerCase()).replace(/\\\*/g, '.*');
	return new RegExp(`^${source}$`, 'i');
}

/**
 * Prefixes `https://` to input typed without a scheme (`example.com`,
 * `localhost:3000`, `//cdn.example`). Input that already names a scheme is
 * returned untouched, so `javascript:` or `file:` still reach validation.
 */
export function withDefaultScheme(input: string): string {
	const trimmed = input.trim();
	if (trimmed === '') return trimmed;
	if (trimmed.startsWith('//')) return `https:${trimmed}`;

	const match = SCHEME_PATTERN.exec(trimmed);
	if (match) {
		const name = match[1];
		const next = trimmed.charAt(match[0].length);
		const looksLikeHostPort = name.includes('.') || /\d/.test(next);
		if (!looksLikeHostPort) return trimmed;
	}
	return `https://${trimmed}`;
}

type Preflight = { verdict: ValidationVerdict } | { hostname: string };

function unsafe(reason: string): { verdict: ValidationVerdict } {
	return { verdict: { safe: false, reason } };
}

function safe(reason: string): ValidationVerdict {
	return { safe: true, reason };
}

/**
 * Decides whether a URL may be fetched by the browser. Checks run in a fixed
 * order: scheme, hostname, deny list, dangerous hostnames, allow list, literal
 * IP, then every resolved address. The deny list and dangerous hostnames are
 * enforced even when private network access is enabled; that flag only turns
 * off the reserved-address checks.
 */
export class UrlValidator {
	readonly allowPrivateNetwork: boolean;
	private readonly allowed: RegExp[];
	private readonly blocked: RegExp[];
	private readonly resolver: HostResolver;

	constructor(options: UrlValidatorOptions = {}) {
		this.allowPrivateNetwork = options.allowPrivateNetwork ?? false;
		this.allowed = (options.allowedDomains ?? []).map(compileDomainPattern);
		this.blocked = (options.blockedDomains ?? []).map(compileDomainPattern);
		this.resolver = options.resolver ?? resolveAllAddresses;
	}

	static fromConfig(security: SecurityConfig, resolver?: HostResolver): UrlValidator {
		return new UrlValidator({
			allowPrivateNetwork: security.allowPrivateNetwork,
			allowedDomains: security.allowedDomains,
			blockedDomains: security.blockedDomains,
			resolver,
		});
	}

	async validate(url: string): Promise<ValidationVerdict> {
		const pre = this.preflight(url);
		if ('verdict' in pre) return pre.verdict;

		const { hostname } = pre;
		if (this.allowPrivateNetwork) {
			return safe('private network access enabled; address checks skipped');
		}

		let addresses: string[];
		try {
			addresses = await this.resolver(hostname);
		} catch (error) {
			logger.warn(`DNS lookup failed for ${hostname}, leaving it to the navigation: ${error}`);
			return safe(`DNS lookup failed for ${hostname}; not blocked`);
		}

		if (addresses.length === 0) {
			return { safe: false, reason: `DNS lookup for ${hostname} returned no addresses` };
		}

		for (const address of addresses) {
			const classification = classifyIp(address);
			if (classification.reserved) {
				return { safe: false, reason: `${hostname} resolves to ${classification.reason}` };
			}
		}

		logger.debug(`${hostname} resolved to ${addresses.join(', ')}`);
		return safe(`${hostname} resolves only to public addresses`);
	}

	/** Every check except DNS resolution. */
	validateSync(url: string): ValidationVerdict {
		const pre = this.preflight(url);
		if ('verdict' in pre) return pre.verdict;
		return safe(`${pre.hostname} passed static checks; DNS not consulted`);
	}

	isDomainBlocked(hostname: string): boolean {
		return this.blocked.some((pattern) => pattern.test(hostname));
	}

	isDomainAllowed(hostname: string): boolean {
		return this.allowed.length === 0 || this.allowed.some((pattern) => pattern.test(hostname));
	}

	private preflight(url: string): Preflight {
		const trimmed = url.trim();
		if (!SCHEME_PATTERN.test(trimmed)) {
			return unsafe('URL has no scheme');
		}

		let parsed: URL;
		try {
			parsed = new URL(trimmed);
		} catch {
			return unsafe(`malformed URL: ${trimmed}`);
		}

		if (!ALLOWED_SCHEMES.has(parsed.protocol)) {
			return unsafe(`scheme "${parsed.protocol.replace(/:$/, '')}" is not allowed; only http and https are`);
		}

		const hostname = unbracket(parsed.hostname.toLowerCase()).replace(/\.$/, '');
		if (hostname === '') {
			return unsafe('URL has no hostname');
		}

		if (this.isDomainBlocked(hostname)) {
			return unsafe(`domain ${hostname} is on the deny list`);
		}

		if (!this.allowPrivateNetwork && DANGEROUS_HOSTNAMES.has(hostname)) {
			return unsafe(`hostname ${hostname} points at a local or metadata service`);
		}

		if (!this.isDomainAllowed(hostname)) {
			return unsafe(`domain ${hostname} is not on the allow list`);
		}

		if (ipFamily(hostname)) {
			if (this.allowPrivateNetwork) {
				return { verdict: safe('private network access enabled; address checks skipped') };
			}
			const classification = classifyIp(hostname);
			return classification.reserved
				? unsafe(classification.reason)
				: { verdict: safe(`${hostname} is a public address`) };
		}

		return { hostname };
	}
}
