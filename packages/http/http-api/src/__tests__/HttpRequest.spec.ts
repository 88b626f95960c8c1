import { RequestHeaderMap, WindRequest, isHttpRequest } from '../HttpRequest';
import { isHttpMethod } from '../HttpMethod';

describe('WindRequest', () => {
    it('should split the path from the query string', () => {
        const request = new WindRequest('GET', '/search?q=wind');

        expect(request.path).toBe('/search');
        expect(request.url).toBe('/search?q=wind');
        expect(request.version).toBe('HTTP/1.1');
    });

    it('should expose If-None-Match regardless of header casing', () => {
        const headers = new RequestHeaderMap([['IF-NONE-MATCH', 'abc123']]);

        expect(headers.ifNoneMatch).toBe('abc123');
        expect(headers.get('If-None-Match')).toBe('abc123');
        expect(new RequestHeaderMap().ifNoneMatch).toBeUndefined();
    });
});

describe('isHttpRequest', () => {
    it('should accept structured requests and reject anything else', () => {
        expect(isHttpRequest(new WindRequest('GET', '/'))).toBe(true);
        expect(isHttpRequest({ method: 'GET', path: '/' })).toBe(false);
        expect(isHttpRequest('GET / HTTP/1.1')).toBe(false);
        expect(isHttpRequest(null)).toBe(false);
    });
});

describe('isHttpMethod', () => {
    it('should only accept the supported lowercase methods', () => {
        expect(isHttpMethod('get')).toBe(true);
        expect(isHttpMethod('head')).toBe(true);
        expect(isHttpMethod('GET')).toBe(false);
        expect(isHttpMethod('patch')).toBe(false);
    });
});
