import { RedirectBlockedError, SecurityRejectionError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { UrlValidator } from './url-validator.js';

const logger = createLogger('image-download');

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const DATA_IMAGE_PATTERN = /^data:image\/[a-z0-9.+-]+;base64,(.*)$/is;

export const DEFAULT_MAX_IMAGE_BYTES = 50 * 1024 * 1024;
export const DEFAULT_MAX_REDIRECTS = 5;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ImageDownloadOptions {
	validator: UrlValidator;
	timeoutMs: number;
	maxBytes?: number;
	maxRedirects?: number;
	/** Page the image was found on; some hosts refuse hotlinks without it. */
	referer?: string;
	userAgent?: string;
	fetch?: FetchLike;
}

/** Decodes an inline `data:image/...;base64,` URL; null for anything else. */
export function decodeDataImage(url: string): Buffer | null {
	const match = DATA_IMAGE_PATTERN.exec(url);
	return match ? Buffer.from(match[1], 'base64') : null;
}

/**
 * Fetches an image with the same checks a navigation gets. Redirects are
 * followed by hand so that every hop passes the validator before it is
 * requested.
 */
export async function downloadImage(url: string, options: ImageDownloadOptions): Promise<Buffer> {
	const inline = decodeDataImage(url);
	if (inline) return inline;

	const fetchImpl = options.fetch ?? fetch;
	const maxBytes = options.maxBytes ?? DEFAULT_MAX_IMAGE_BYTES;
	const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
	const headers: Record<string, string> = { Accept: 'image/avif,image/webp,image/apng,image/*,*/*;q=0.8' };
	if (options.referer) headers.Referer = options.referer;
	if (options.userAgent) headers['User-Agent'] = options.userAgent;

	let current = url;
	for (let hop = 0; hop <= maxRedirects; hop++) {
		const verdict = await options.validator.validate(current);
		if (!verdict.safe) {
			if (hop === 0) throw new SecurityRejectionError(current, verdict.reason);
			throw new RedirectBlockedError(url, current, verdict.reason);
		}

		const response = await fetchImpl(current, {
			headers,
			redirect: 'manual',
			signal: AbortSignal.timeout(options.timeoutMs),
		});

		const location = response.headers.get('location');
		if (REDIRECT_STATUSES.has(response.status) && location) {
			await response.body?.cancel();
			current = new URL(location, current).href;
			continue;
		}
		if (!response.ok) {
			throw new Error(`HTTP ${response.status} from ${current}`);
		}

		const declared = Number(response.headers.get('content-length') ?? '');
		if (declared > maxBytes) {
			await response.body?.cancel();
			throw new Error(`Image is ${declared} bytes, over the ${maxBytes}-byte limit`);
		}
		const contentType = response.headers.get('content-type') ?? '';
		if (!contentType.startsWith('image/')) {
			logger.warn(`${current} answered with ${contentType || 'no content type'}; keeping the body anyway`);
		}

		const body = Buffer.from(await response.arrayBuffer());
		if (body.length > maxBytes) {
			throw new Error(`Image is ${body.length} bytes, over the ${maxBytes}-byte limit`);
		}
		return body;
	}

	throw new Error(`Too many redirects fetching ${url}`);
}
