import { HttpBadRequestError, HttpPayloadTooLargeError } from '@wind/http-api';
import { RequestHeadParser } from '../transport/RequestHeadParser';

function bytes(text: string): Buffer {
    return Buffer.from(text, 'latin1');
}

describe('RequestHeadParser', () => {
    it('should parse a complete head', () => {
        const parser = new RequestHeadParser();

        const request = parser.push(bytes('GET /items?page=2 HTTP/1.1\r\nHost: example\r\nIf-None-Match: abc\r\n\r\n'));

        expect(request).toBeDefined();
        expect(request?.method).toBe('GET');
        expect(request?.url).toBe('/items?page=2');
        expect(request?.path).toBe('/items');
        expect(request?.version).toBe('HTTP/1.1');
        expect(request?.headers.get('HOST')).toBe('example');
        expect(request?.headers.ifNoneMatch).toBe('abc');
        expect(request?.body).toBeUndefined();
    });

    it('should wait until the head is complete', () => {
        const parser = new RequestHeadParser();

        expect(parser.push(bytes('GET / HTTP/1.0\r\n'))).toBeUndefined();
        expect(parser.push(bytes('Host: example\r\n'))).toBeUndefined();
        const request = parser.push(bytes('\r\n'));

        expect(request?.version).toBe('HTTP/1.0');
        expect(request?.headers.get('host')).toBe('example');
    });

    it('should read a body of Content-Length bytes', () => {
        const parser = new RequestHeadParser();

        expect(parser.push(bytes('POST /save HTTP/1.1\r\nContent-Length: 7\r\n\r\n{"a"'))).toBeUndefined();
        const request = parser.push(bytes(':1}'));

        expect(request?.body?.toString()).toBe('{"a":1}');
    });

    it('should assemble a body that arrives in several chunks', () => {
        const parser = new RequestHeadParser();

        expect(parser.push(bytes('PUT /doc HTTP/1.1\r\nContent-Length: 9\r\n\r\nabc'))).toBeUndefined();
        expect(parser.push(bytes('def'))).toBeUndefined();
        const request = parser.push(bytes('ghiEXTRA'));

        expect(request?.body?.toString()).toBe('abcdefghi');
    });

    it('should refuse a Content-Length above the body limit before reading the body', () => {
        const parser = new RequestHeadParser(8 * 1024, 16);

        expect(() => parser.push(bytes('POST /upload HTTP/1.1\r\nContent-Length: 17\r\n\r\n'))).toThrow(
            HttpPayloadTooLargeError,
        );
    });

    it('should accept a body exactly at the limit', () => {
        const parser = new RequestHeadParser(8 * 1024, 4);

        const request = parser.push(bytes('POST /upload HTTP/1.1\r\nContent-Length: 4\r\n\r\nabcd'));

        expect(request?.body?.toString()).toBe('abcd');
    });

    it('should reject a malformed request line', () => {
        const parser = new RequestHeadParser();

        expect(() => parser.push(bytes('GET\r\n\r\n'))).toThrow(HttpBadRequestError);
    });

    it('should reject a target that is not a path', () => {
        const parser = new RequestHeadParser();

        expect(() => parser.push(bytes('GET index.html HTTP/1.1\r\n\r\n'))).toThrow("Invalid request line 'GET index.html HTTP/1.1'");
    });

    it('should reject a header line without a name', () => {
        const parser = new RequestHeadParser();

        expect(() => parser.push(bytes('GET / HTTP/1.1\r\nno colon here\r\n\r\n'))).toThrow(
            "Invalid header line 'no colon here'",
        );
    });

    it('should reject a head larger than the limit', () => {
        const parser = new RequestHeadParser(256);

        expect(() => parser.push(bytes(`GET /${'a'.repeat(300)}`))).toThrow('Request head too large');
    });
});
