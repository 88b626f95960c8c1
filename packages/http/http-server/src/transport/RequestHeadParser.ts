import { HttpBadRequestError, HttpPayloadTooLargeError, RequestHeaderMap, WindRequest } from '@wind/http-api';

const HEAD_TERMINATOR = '\r\n\r\n';
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const VERSION = /^HTTP\/\d(\.\d)?$/;

class RequestHead {
    constructor(
        public method: string,
        public target: string,
        public version: string,
        public headers: RequestHeaderMap,
        public contentLength: number,
    ) {}
}

/**
 * RequestHeadParser - Turns the bytes of one connection into a WindRequest.
 *
 * Bytes are pushed as they arrive; push() returns the request once the head
 * and a Content-Length body are complete. Malformed input and heads larger
 * than maxHeaderBytes raise HttpBadRequestError; a Content-Length above
 * maxBodyBytes raises HttpPayloadTooLargeError before any body is buffered.
 */
export class RequestHeadParser {
    private chunks: Buffer[] = [];
    private bufferedBytes = 0;
    private head?: RequestHead;

    constructor(
        private readonly maxHeaderBytes: number = 8 * 1024,
        private readonly maxBodyBytes: number = 1024 * 1024,
    ) {}

    push(data: Buffer): WindRequest | undefined {
        this.chunks.push(data);
        this.bufferedBytes += data.length;

        if (!this.head) {
            const buffered = this.collect();
            const end = buffered.indexOf(HEAD_TERMINATOR);
            if (end === -1) {
                if (buffered.length > this.maxHeaderBytes) {
                    throw new HttpBadRequestError('Request head too large');
                }
                return undefined;
            }
            if (end + HEAD_TERMINATOR.length > this.maxHeaderBytes) {
                throw new HttpBadRequestError('Request head too large');
            }
            const head = RequestHeadParser.parseHead(buffered.subarray(0, end).toString('latin1'));
            if (head.contentLength > this.maxBodyBytes) {
                throw new HttpPayloadTooLargeError(
                    `Content-Length ${head.contentLength} exceeds the ${this.maxBodyBytes} byte limit`,
                );
            }
            this.head = head;
            const rest = buffered.subarray(end + HEAD_TERMINATOR.length);
            this.chunks = [rest];
            this.bufferedBytes = rest.length;
        }

        const head = this.head;
        if (this.bufferedBytes < head.contentLength) {
            return undefined;
        }
        const body = head.contentLength > 0 ? Buffer.from(this.collect().subarray(0, head.contentLength)) : undefined;
        return new WindRequest(head.method, head.target, head.headers, head.version, body);
    }

    /**
     * Joins the pending chunks into one buffer and keeps that as the only chunk.
     */
    private collect(): Buffer {
        const buffered = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.bufferedBytes);
        this.chunks = [buffered];
        return buffered;
    }

    private static parseHead(text: string): RequestHead {
        const [requestLine, ...headerLines] = text.split('\r\n');

        const parts = requestLine.split(' ');
        if (parts.length !== 3) {
            throw new HttpBadRequestError(`Invalid request line '${requestLine}'`);
        }
        const [method, target, version] = parts;
        if (!TOKEN.test(method) || !target.startsWith('/') || !VERSION.test(version)) {
            throw new HttpBadRequestError(`Invalid request line '${requestLine}'`);
        }

        const entries: Array<[string, string]> = [];
        for (const line of headerLines) {
            const colon = line.indexOf(':');
            const name = colon === -1 ? '' : line.substring(0, colon);
            if (!TOKEN.test(name)) {
                throw new HttpBadRequestError(`Invalid header line '${line}'`);
            }
            entries.push([name, line.substring(colon + 1).trim()]);
        }
        const headers = new RequestHeaderMap(entries);

        const lengthValue = headers.get('content-length');
        let contentLength = 0;
        if (lengthValue !== undefined) {
            if (!/^\d+$/.test(lengthValue)) {
                throw new HttpBadRequestError(`Invalid Content-Length '${lengthValue}'`);
            }
            contentLength = parseInt(lengthValue, 10);
        }

        return new RequestHead(method, target, version, headers, contentLength);
    }
}
