/**
 * Error classes for the site build. The CLI maps each one to an exit code.
 */

/** Missing or invalid configuration; raised before any request is made. */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

/** The API rejected the token (401/403). */
export class AuthError extends Error {
    constructor(message: string, public status: number) {
        super(message);
        this.name = "AuthError";
        Object.setPrototypeOf(this, AuthError.prototype);
    }
}

/** The request never got an HTTP answer: DNS, reset, timeout. */
export class NetworkError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = "NetworkError";
        Object.setPrototypeOf(this, NetworkError.prototype);
    }
}

/** Any other non-2xx answer, or a body that is not what the API documents. */
export class ApiError extends Error {
    constructor(message: string, public status?: number) {
        super(message);
        this.name = "ApiError";
        Object.setPrototypeOf(this, ApiError.prototype);
    }
}

export class OutputError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = "OutputError";
        Object.setPrototypeOf(this, OutputError.prototype);
    }
}

export function isConfigError(error: unknown): error is ConfigError {
    return error instanceof ConfigError;
}

export function isAuthError(error: unknown): error is AuthError {
    return error instanceof AuthError;
}

export function isNetworkError(error: unknown): error is NetworkError {
    return error instanceof NetworkError;
}

export function isApiError(error: unknown): error is ApiError {
    return error instanceof ApiError;
}

export function isOutputError(error: unknown): error is OutputError {
    return error instanceof OutputError;
}

/** Process exit code for an error that reached the CLI. */
export function exitCodeFor(error: unknown): number {
    if (isConfigError(error)) return 2;
    if (isAuthError(error)) return 3;
    if (isNetworkError(error) || isApiError(error)) return 4;
    if (isOutputError(error)) return 5;
    return 1;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
