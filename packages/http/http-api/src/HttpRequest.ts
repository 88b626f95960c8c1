/**
 * Read access to request headers.
 * Names are matched case-insensitively.
 */
export interface RequestHeaders {
    get(name: string): string | undefined;

    /**
     * The conditional validator sent by the client, if any.
     */
    readonly ifNoneMatch: string | undefined;
}

/**
 * HttpRequest - The structured request produced by the parsing layer.
 * Immutable for the duration of one handling cycle.
 */
export interface HttpRequest {
    /**
     * Method as received ("GET"); the Resource lowercases it for dispatch.
     */
    readonly method: string;

    /**
     * Path used for route lookup, without the query string.
     */
    readonly path: string;

    /**
     * Request target as received, query string included.
     */
    readonly url: string;

    readonly headers: RequestHeaders;

    /**
     * Protocol version such as "HTTP/1.1".
     */
    readonly version: string;

    readonly body?: Buffer;
}

/**
 * Header map keyed by lowercase name.
 */
export class RequestHeaderMap implements RequestHeaders {
    private readonly values = new Map<string, string>();

    constructor(entries: Iterable<[string, string]> = []) {
        for (const [name, value] of entries) {
            this.values.set(name.toLowerCase(), value);
        }
    }

    get(name: string): string | undefined {
        return this.values.get(name.toLowerCase());
    }

    get ifNoneMatch(): string | undefined {
        return this.get('if-none-match');
    }

    entries(): IterableIterator<[string, string]> {
        return this.values.entries();
    }
}

/**
 * Plain HttpRequest implementation used by the transport and by tests.
 */
export class WindRequest implements HttpRequest {
    readonly path: string;

    constructor(
        public readonly method: string,
        public readonly url: string,
        public readonly headers: RequestHeaders = new RequestHeaderMap(),
        public readonly version: string = 'HTTP/1.1',
        public readonly body?: Buffer,
    ) {
        const queryStart = url.indexOf('?');
        this.path = queryStart === -1 ? url : url.substring(0, queryStart);
    }
}

/**
 * Runtime check for values arriving from untyped callers.
 */
export function isHttpRequest(value: unknown): value is HttpRequest {
    if (value === null || typeof value !== 'object') {
        return false;
    }
    return (
        'method' in value &&
        typeof value.method === 'string' &&
        'path' in value &&
        typeof value.path === 'string' &&
        'url' in value &&
        typeof value.url === 'string' &&
        'version' in value &&
        typeof value.version === 'string' &&
        'headers' in value &&
        typeof value.headers === 'object' &&
        value.headers !== null
    );
}
