/**
 * Error classes for wind.
 *
 * HttpError subclasses are expected HTTP conditions: thrown from handler code
 * (or from Resource.finish()) and translated into a response by the Resource.
 * ConfigurationError is a setup failure and never reaches a client.
 */

/**
 * HttpError - Base error class with HTTP status code.
 */
export class HttpError extends Error {
    public code: number;
    public readonly httpCause?: Error;

    constructor(message: string, code: number, cause?: Error) {
        super(message);
        this.code = code;
        this.httpCause = cause;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpNotModifiedError - 304 Not Modified.
 * Raised by finish() when If-None-Match equals the computed ETag.
 */
export class HttpNotModifiedError extends HttpError {
    public readonly etag?: string;

    constructor(etag?: string) {
        super('Not Modified', 304);
        this.name = 'NotModified';
        this.etag = etag;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpBadRequestError - 400 Bad Request.
 * Used by the transport when a request head cannot be parsed.
 */
export class HttpBadRequestError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 400, cause);
        this.name = 'BadRequest';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpPayloadTooLargeError - 413 Payload Too Large.
 * Used by the transport when Content-Length exceeds the configured limit.
 */
export class HttpPayloadTooLargeError extends HttpError {
    constructor(message: string) {
        super(message, 413);
        this.name = 'PayloadTooLarge';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpNotFoundError - 404 Not Found.
 */
export class HttpNotFoundError extends HttpError {
    constructor(message = 'Not Found', cause?: Error) {
        super(message, 404, cause);
        this.name = 'NotFound';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpMethodNotAllowedError - 405 Method Not Allowed.
 */
export class HttpMethodNotAllowedError extends HttpError {
    constructor(message = 'Method Not Allowed', cause?: Error) {
        super(message, 405, cause);
        this.name = 'MethodNotAllowed';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * HttpInternalServerError - 500 Internal Server Error.
 */
export class HttpInternalServerError extends HttpError {
    constructor(message = 'Internal Server Error', cause?: Error) {
        super(message, 500, cause);
        this.name = 'InternalServerError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * ConfigurationError - malformed route table, unsupported method name,
 * non-callable handler or invalid server config. Fatal to startup.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
