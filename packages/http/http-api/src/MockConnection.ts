import { Connection } from './Connection';

/**
 * Parsed view of one raw HTTP response written to a MockConnection.
 */
export class CapturedResponse {
    constructor(
        public statusLine: string,
        public statusCode: number,
        public headers: Map<string, string>,
        public body: string,
    ) {}

    static parse(raw: Buffer): CapturedResponse {
        const text = raw.toString('utf-8');
        const headEnd = text.indexOf('\r\n\r\n');
        const head = headEnd === -1 ? text : text.substring(0, headEnd);
        const body = headEnd === -1 ? '' : text.substring(headEnd + 4);
        const [statusLine, ...headerLines] = head.split('\r\n');
        const headers = new Map<string, string>();
        for (const line of headerLines) {
            const colon = line.indexOf(':');
            headers.set(line.substring(0, colon), line.substring(colon + 1).trim());
        }
        const statusCode = parseInt(statusLine.split(' ')[1], 10);
        return new CapturedResponse(statusLine, statusCode, headers, body);
    }
}

/**
 * In-process Connection for tests.
 *
 * By default completion callbacks fire synchronously inside write(); with
 * autoComplete=false they queue until completeWrites() is called, which lets a
 * test observe the state between the write and its completion.
 */
export class MockConnection implements Connection {
    readonly writes: Buffer[] = [];
    closed = false;
    closeCount = 0;
    private pending: Array<() => void> = [];

    constructor(private autoComplete = true) {}

    write(data: Buffer, onComplete: () => void): void {
        this.writes.push(data);
        if (this.autoComplete) {
            onComplete();
        } else {
            this.pending.push(onComplete);
        }
    }

    close(): void {
        this.closed = true;
        this.closeCount++;
    }

    completeWrites(): void {
        const callbacks = this.pending;
        this.pending = [];
        for (const callback of callbacks) {
            callback();
        }
    }

    get pendingWrites(): number {
        return this.pending.length;
    }

    /**
     * The single response written so far, parsed.
     */
    response(): CapturedResponse {
        if (this.writes.length !== 1) {
            throw new Error(`Expected exactly one write, got ${this.writes.length}`);
        }
        return CapturedResponse.parse(this.writes[0]);
    }
}
