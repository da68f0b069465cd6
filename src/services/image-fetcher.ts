/**
 * Image Fetcher
 * Downloads one image with retry and pacing, validates and normalizes it
 */

import sharp from 'sharp';

import { IMAGE } from '../config/constants';
import { DEFAULT_SETTINGS } from '../config/settings';
import { AssetError, CancelledError, HttpError } from './errors';
import type { NetworkManager } from './network';
import type { ImageAsset, ImageFormat, ImageSettings } from '../types';

export interface ImageFetchOptions {
    referer?: string;
    signal?: AbortSignal;
    /** Delay applied after every attempt */
    pacing?: number;
    onAttemptFailed?: (attempt: number, error: Error, retryable: boolean) => void;
}

export class ImageFetcher {
    private readonly settings: ImageSettings;

    constructor(
        private readonly network: NetworkManager,
        settings?: Partial<ImageSettings>
    ) {
        this.settings = { ...DEFAULT_SETTINGS.image, ...settings };
    }

    /**
     * Fetches and normalizes one image
     *
     * @throws AssetError on a non-transient failure or when retries are exhausted
     * @throws CancelledError when cancellation was observed before a retry
     */
    async fetchImage(url: string, options: ImageFetchOptions = {}): Promise<ImageAsset> {
        let failedAttempts = 0;
        let bytes: Buffer;

        try {
            bytes = await this.network.fetchBuffer(url, {
                headers: options.referer ? { Referer: options.referer } : undefined,
                signal: options.signal,
                pacing: options.pacing,
                onAttemptFailed: (attempt, error, retryable) => {
                    failedAttempts = attempt;
                    options.onAttemptFailed?.(attempt, error, retryable);
                },
            });
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            const retryable = error instanceof HttpError && error.transient;
            const reason = error instanceof Error ? error.message : String(error);
            throw new AssetError(
                retryable
                    ? `Image failed after ${failedAttempts} attempts: ${reason}`
                    : `Image failed: ${reason}`,
                url,
                Math.max(failedAttempts, 1),
                retryable,
                { cause: error }
            );
        }

        const attempt = failedAttempts + 1;
        try {
            return await this.normalize(url, bytes, attempt);
        } catch (error) {
            if (error instanceof AssetError) {
                options.onAttemptFailed?.(attempt, error, false);
            }
            throw error;
        }
    }

    /**
     * Loads an image persisted by a previous run without re-encoding it
     *
     * @returns null when the stored file is not a usable image
     */
    async fromCache(sourceUrl: string, bytes: Buffer): Promise<ImageAsset | null> {
        try {
            const { width, height, format } = await sharp(bytes).metadata();
            if (!width || !height || (format !== 'jpeg' && format !== 'png')) return null;
            return { sourceUrl, bytes, width, height, format };
        } catch {
            return null;
        }
    }

    /**
     * Decodes an image payload and re-encodes it: transparency flattened to
     * white, optional grayscale, downscaled to maxWidth. The result is JPEG,
     * or lossless PNG when a side would exceed the JPEG limit.
     *
     * @throws AssetError when the payload is not a decodable image
     */
    async normalize(sourceUrl: string, bytes: Buffer, attempts = 1): Promise<ImageAsset> {
        const { jpegQuality, progressive, grayscale, maxWidth } = this.settings;

        try {
            const metadata = await sharp(bytes).metadata();
            if (!metadata.width || !metadata.height) {
                throw new Error('image has no dimensions');
            }

            let pipeline = sharp(bytes).rotate().flatten({ background: '#ffffff' });
            if (grayscale) {
                pipeline = pipeline.grayscale();
            }
            if (maxWidth > 0) {
                pipeline = pipeline.resize({ width: maxWidth, withoutEnlargement: true });
            }

            const format = outputFormat(metadata.width, metadata.height, metadata.orientation, maxWidth);
            pipeline = format === 'png'
                ? pipeline.png()
                : pipeline.jpeg({ quality: jpegQuality, progressive });

            const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });

            if (info.width <= 0 || info.height <= 0) {
                throw new Error('image has no dimensions');
            }

            return { sourceUrl, bytes: data, width: info.width, height: info.height, format };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new AssetError(`Not a decodable image (${reason}): ${sourceUrl}`, sourceUrl, attempts, false, {
                cause: error,
            });
        }
    }
}

/**
 * Encoding for a normalized image, from its decoded size before rotation
 * and downscaling. EXIF orientations 5-8 swap width and height.
 */
export function outputFormat(width: number, height: number, orientation: number | undefined, maxWidth: number): ImageFormat {
    let [w, h] = (orientation ?? 1) >= 5 ? [height, width] : [width, height];
    if (maxWidth > 0 && w > maxWidth) {
        h = Math.round((h * maxWidth) / w);
        w = maxWidth;
    }
    return Math.max(w, h) > IMAGE.JPEG_MAX_SIDE ? 'png' : 'jpeg';
}
