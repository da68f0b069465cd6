/**
 * Error types for chapter-binder
 */

/**
 * Base class for every error the engine raises on purpose
 */
export class BinderError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BinderError';
    }
}

/**
 * HTTP failure raised by NetworkManager
 */
export class HttpError extends BinderError {
    constructor(
        message: string,
        public readonly status: number | null,
        public readonly transient: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'HttpError';
    }
}

export type ProviderErrorKind = 'transient' | 'fatal';

/**
 * The provider could not turn a chapter reference into content
 */
export class ProviderError extends BinderError {
    constructor(
        message: string,
        public readonly kind: ProviderErrorKind,
        public readonly url: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ProviderError';
    }
}

/**
 * An image could not be fetched or decoded
 */
export class AssetError extends BinderError {
    constructor(
        message: string,
        public readonly url: string,
        public readonly attempts: number,
        public readonly retryable: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AssetError';
    }
}

/**
 * PDF encoding or writing failed; partial output has been removed
 */
export class AssemblyError extends BinderError {
    constructor(message: string, public readonly outPath: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AssemblyError';
    }
}

/**
 * A merge group could not be written
 */
export class MergeError extends BinderError {
    constructor(message: string, public readonly group: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MergeError';
    }
}

/**
 * Cancellation observed at a retry boundary
 */
export class CancelledError extends BinderError {
    constructor(message = 'Operation cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

export class SettingsError extends BinderError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SettingsError';
    }
}
