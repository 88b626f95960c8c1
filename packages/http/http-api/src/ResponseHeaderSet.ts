export const DEFAULT_CONTENT_TYPE = 'text/plain; charset=utf-8';
export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

/**
 * ResponseHeaderSet - Mutable response headers for one Resource.
 *
 * Serialization follows insertion order. Names compare case-insensitively: adding
 * a header that is already present replaces its value in place and keeps the
 * casing it was first added with.
 *
 * Starts out with a default Content-Type; clear() returns to that state so the
 * set can be reused when an error response supersedes a half-built one.
 */
export class ResponseHeaderSet {
    private headers = new Map<string, [string, string]>();

    constructor() {
        this.seedDefaults();
    }

    add(key: string, value: string): void {
        const normalized = key.toLowerCase();
        const existing = this.headers.get(normalized);
        this.headers.set(normalized, [existing ? existing[0] : key, value]);
    }

    remove(key: string): void {
        this.headers.delete(key.toLowerCase());
    }

    get(key: string): string | undefined {
        return this.headers.get(key.toLowerCase())?.[1];
    }

    has(key: string): boolean {
        return this.headers.has(key.toLowerCase());
    }

    clear(): void {
        this.headers.clear();
        this.seedDefaults();
    }

    toMapping(): Map<string, string> {
        const mapping = new Map<string, string>();
        for (const [name, value] of this.headers.values()) {
            mapping.set(name, value);
        }
        return mapping;
    }

    addContentLength(byteCount: number): void {
        this.add('Content-Length', String(byteCount));
    }

    toJsonContent(): void {
        this.add('Content-Type', JSON_CONTENT_TYPE);
    }

    addEtag(etag: string): void {
        this.add('ETag', etag);
    }

    private seedDefaults(): void {
        this.add('Content-Type', DEFAULT_CONTENT_TYPE);
    }
}
