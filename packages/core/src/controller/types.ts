import type { ErrorKind } from '../errors.js';
import type { UserId } from '../types.js';

/** What every controller operation resolves to; failures never throw past the controller. */
export interface OperationResult {
	ok: boolean;
	message: string;
	/** PNG at CSS-pixel scale. */
	image?: Buffer;
	/** Further PNGs, after `image`. */
	images?: Buffer[];
	data?: Record<string, unknown>;
	errorKind?: ErrorKind;
}

export interface OutboundImage {
	userId: UserId;
	image: Buffer;
	title: string;
	url: string;
}

/** Hands a confirmed screenshot to the end user (chat message, upload, ...). */
export interface ImageDelivery {
	deliver(image: OutboundImage): Promise<void>;
}

export type ConfirmAction = 'send' | 'cancel';

export interface SendImagesRequest {
	urls?: string[];
	elementIds?: number[];
}
