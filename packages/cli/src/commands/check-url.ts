import type { Command } from 'commander';
import {
	Config,
	type HostResolver,
	type SecurityConfig,
	UrlValidator,
	type ValidationVerdict,
	withDefaultScheme,
} from '@tagsight/core';
import { formatVerdict } from '../display.js';

export interface CheckUrlOptions {
	allowPrivate?: boolean;
	allow?: string[];
	deny?: string[];
}

/** Flags add to the configured lists; `--allow-private` only ever widens. */
export function mergeSecurity(base: SecurityConfig, options: CheckUrlOptions): SecurityConfig {
	return {
		allowPrivateNetwork: base.allowPrivateNetwork || (options.allowPrivate ?? false),
		allowedDomains: [...base.allowedDomains, ...(options.allow ?? [])],
		blockedDomains: [...base.blockedDomains, ...(options.deny ?? [])],
	};
}

export async function checkUrl(
	input: string,
	security: SecurityConfig,
	resolver?: HostResolver,
): Promise<{ url: string; verdict: ValidationVerdict }> {
	const url = withDefaultScheme(input.trim());
	const verdict = await UrlValidator.fromConfig(security, resolver).validate(url);
	return { url, verdict };
}

export function registerCheckUrlCommand(program: Command): void {
	program
		.command('check-url')
		.description('Check whether a URL may be opened under the navigation security policy')
		.argument('<url>', 'URL to check; https:// is assumed when no scheme is given')
		.option('--allow-private', 'Skip the private and reserved address checks')
		.option('--allow <glob...>', 'Only allow these domain patterns')
		.option('--deny <glob...>', 'Always refuse these domain patterns')
		.action(async (input: string, options: CheckUrlOptions) => {
			const security = mergeSecurity(Config.load().security, options);
			const { url, verdict } = await checkUrl(input, security);
			console.log(formatVerdict(url, verdict));
			process.exitCode = verdict.safe ? 0 : 1;
		});
}
