import { HttpRequest } from './HttpRequest';
import { reasonPhrase } from './HttpStatusCode';

const DEFAULT_VERSION = 'HTTP/1.1';

/**
 * HttpResponse - Status line and header block of a response.
 *
 * Built from a snapshot of the headers at generation time; later header
 * changes need a new HttpResponse.
 */
export class HttpResponse {
    readonly version: string;

    constructor(
        public readonly statusCode: number,
        public readonly headers: Map<string, string>,
        request?: HttpRequest,
    ) {
        this.version = request?.version || DEFAULT_VERSION;
    }

    /**
     * Serialized head: status line, one line per header, then the blank line.
     */
    raw(): string {
        let head = `${this.version} ${this.statusCode} ${reasonPhrase(this.statusCode)}\r\n`;
        for (const [name, value] of this.headers) {
            head += `${name}: ${value}\r\n`;
        }
        return head + '\r\n';
    }
}
