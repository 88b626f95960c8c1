import { createHash } from 'crypto';
import { Encodable, LogType, toBytes, toError, WriteBuffer } from '@wind/core-util';
import {
    Connection,
    HttpError,
    HttpMethodNotAllowedError,
    HttpNotFoundError,
    HttpNotModifiedError,
    HttpRequest,
    HttpResponse,
    HttpStatusCode,
    ResponseHeaderSet,
    isBodyless,
} from '@wind/http-api';
import { ResourceContext } from './ResourceContext';

/**
 * Structured bodies; written as JSON with a JSON Content-Type.
 */
export type JsonBody = { [key: string]: unknown } | unknown[];

/**
 * Anything write() accepts. null, undefined, 0 and '' write nothing.
 */
export type ResponseChunk = Encodable | JsonBody | null | undefined;

/**
 * A plain function bound to a route: takes the request, returns the body.
 */
export type RequestFunction = (request: HttpRequest) => ResponseChunk | Promise<ResponseChunk>;

/**
 * What a Resource needs to know about the binding that created it.
 * Implemented by Path.
 */
export interface RouteBinding {
    readonly isErrorPath: boolean;

    allowed(method: string): boolean | undefined;
}

export type ResourceState = 'new' | 'processing' | 'handling' | 'finishing' | 'sent' | 'cleared';

function isJsonBody(chunk: ResponseChunk): chunk is JsonBody {
    return typeof chunk === 'object' && chunk !== null && !(chunk instanceof Uint8Array);
}

/**
 * Resource - Handles one HTTP request and assembles its response.
 *
 * Subclass it and override the handleXxx() methods for the methods the route
 * allows. Output is buffered through write() and sent in one transport write
 * by finish(), which also answers conditional requests with 304 when the
 * client's If-None-Match equals the ETag of the buffered body.
 *
 * ```typescript
 * class HelloResource extends Resource {
 *     handleGet(): void {
 *         this.write('hello wind!');
 *         this.finish();
 *     }
 * }
 * ```
 *
 * By default a resource is asynchronous: the handler calls finish() (or
 * sendResponse()) itself, possibly after awaiting more I/O. Set
 * `asynchronous = false` to have finish() run as soon as the handler returns.
 *
 * Lifecycle: new → processing → handling → finishing → sent → cleared.
 * The clear transition runs in the transport's completion callback and
 * releases the connection, request, buffer and headers exactly once.
 */
export class Resource {
    protected asynchronous = true;

    private state: ResourceState = 'new';
    private synchronousHandler?: RequestFunction;
    private conn?: Connection;
    private currentRequest?: HttpRequest;
    private response?: HttpResponse;
    private statusCode?: number;
    private writeBuffer = new WriteBuffer();
    private responseHeader = new ResponseHeaderSet();
    private deadline?: NodeJS.Timeout;

    constructor(
        protected readonly path: RouteBinding,
        protected readonly context: ResourceContext = new ResourceContext(),
    ) {}

    /**
     * Construction hook, called once by the binding right after the
     * resource is created and before it reacts.
     */
    initialize(): void {}

    handleGet(): void | Promise<void> {
        this.raiseNotAllowed();
    }

    handlePost(): void | Promise<void> {
        this.raiseNotAllowed();
    }

    handlePut(): void | Promise<void> {
        this.raiseNotAllowed();
    }

    handleDelete(): void | Promise<void> {
        this.raiseNotAllowed();
    }

    handleHead(): void | Promise<void> {
        this.raiseNotAllowed();
    }

    /**
     * Bind a plain function; react() then calls it instead of handleXxx().
     */
    inject(handler: RequestFunction): void {
        this.synchronousHandler = handler;
    }

    get lifecycleState(): ResourceState {
        return this.state;
    }

    get processing(): boolean {
        return this.state !== 'new' && this.state !== 'cleared';
    }

    /**
     * The request being handled. Only valid between react() and the
     * completion of the response write.
     */
    protected get request(): HttpRequest {
        if (!this.currentRequest) {
            throw new Error('No request in flight on this resource');
        }
        return this.currentRequest;
    }

    async react(conn: Connection, request: HttpRequest): Promise<void> {
        this.state = 'processing';
        this.conn = conn;
        this.currentRequest = request;

        await this.resume(async () => {
            const method = request.method.toLowerCase();
            if (!this.path.isErrorPath && !this.path.allowed(method)) {
                this.raiseNotAllowed();
            }

            this.state = 'handling';
            if (this.synchronousHandler) {
                const chunk = await this.synchronousHandler(request);
                this.write(chunk);
                this.finish();
                return;
            }

            if (this.asynchronous) {
                this.armDeadline();
            }
            await this.dispatch(method);
            if (!this.asynchronous) {
                this.finish();
            }
        });
    }

    /**
     * Run handler code with the same failure translation react() applies.
     * Asynchronous handlers that continue from a callback or timer wrap the
     * continuation in resume() so that a NotModified from finish() or an
     * unexpected throw still produces a response.
     */
    protected async resume(action: () => void | Promise<void>): Promise<void> {
        try {
            await action();
        } catch (err: unknown) {
            this.handleFailure(toError(err));
        }
    }

    write(chunk: ResponseChunk, prepend = false): void {
        if (chunk === null || chunk === undefined || chunk === 0 || chunk === '') {
            return;
        }

        let payload: Encodable;
        if (isJsonBody(chunk)) {
            payload = JSON.stringify(chunk);
            this.responseHeader.toJsonContent();
        } else {
            payload = chunk;
        }

        const bytes = toBytes(payload);
        if (bytes.length === 0) {
            return;
        }
        if (prepend) {
            this.writeBuffer.appendLeft(bytes);
        } else {
            this.writeBuffer.append(bytes);
        }
    }

    addResponseHeader(key: string, value: string): void {
        this.responseHeader.add(key, value);
    }

    removeResponseHeader(key: string): void {
        this.responseHeader.remove(key);
    }

    /**
     * Status used by the next finish(). Defaults to 200.
     */
    setStatusCode(statusCode: number): void {
        this.statusCode = statusCode;
    }

    /**
     * Send the buffered body as the response.
     *
     * Throws HttpNotModifiedError when the request's If-None-Match equals
     * the ETag of the buffered body; react() and resume() turn that into a
     * bodyless 304.
     */
    finish(): void {
        if (!this.canRespond('finish')) {
            return;
        }
        this.state = 'finishing';

        if (this.etagAvailable()) {
            const etag = this.generateEtag();
            if (this.request.headers.ifNoneMatch === etag) {
                throw new HttpNotModifiedError(etag);
            }
            this.responseHeader.addEtag(etag);
        }

        if (!this.writeBuffer.isEmpty()) {
            this.responseHeader.addContentLength(this.writeBuffer.totalBytes());
        }
        if (this.isHeadRequest()) {
            this.flushBuffer();
        }

        this.statusCode = this.statusCode ?? HttpStatusCode.OK;
        this.transmit();
    }

    /**
     * Send a response made only of the status and errorMessage().
     * Anything buffered so far, headers included, is discarded.
     */
    sendResponse(statusCode: number = HttpStatusCode.OK): void {
        if (!this.canRespond('sendResponse')) {
            return;
        }
        this.state = 'finishing';

        this.flushBuffer();
        this.responseHeader.clear();
        this.statusCode = statusCode;

        if (!isBodyless(statusCode) && !this.isHeadRequest()) {
            this.write(this.errorMessage());
            if (!this.writeBuffer.isEmpty()) {
                this.responseHeader.addContentLength(this.writeBuffer.totalBytes());
            }
        }
        this.transmit();
    }

    /**
     * Body of responses produced by sendResponse(). Override for custom
     * error pages; the default is the numeric status code.
     */
    protected errorMessage(): ResponseChunk {
        return this.statusCode;
    }

    /**
     * ETags need HTTP/1.1 or later (RFC 1945 has none). Override to return
     * false to turn off conditional caching for a resource.
     */
    protected etagAvailable(): boolean {
        const version = this.request.version;
        const number = parseFloat(version.substring(version.indexOf('/') + 1));
        return number > 1.0;
    }

    /**
     * MD5 over the buffered chunks in buffer order, as 32 hex characters.
     * Chunk boundaries do not affect the result.
     */
    protected generateEtag(): string {
        const md5 = createHash('md5');
        for (const chunk of this.writeBuffer) {
            md5.update(chunk);
        }
        return md5.digest('hex');
    }

    private dispatch(method: string): void | Promise<void> {
        switch (method) {
            case 'get':
                return this.handleGet();
            case 'post':
                return this.handlePost();
            case 'put':
                return this.handlePut();
            case 'delete':
                return this.handleDelete();
            case 'head':
                return this.handleHead();
            default:
                this.raiseNotAllowed();
        }
    }

    private raiseNotAllowed(): never {
        throw new HttpMethodNotAllowedError();
    }

    private handleFailure(error: Error): void {
        if (
            error instanceof HttpNotFoundError ||
            error instanceof HttpMethodNotAllowedError ||
            error instanceof HttpNotModifiedError
        ) {
            this.respondSafely(error.code);
            return;
        }

        if (error instanceof HttpError) {
            this.context.logger.log(
                `Unhandled HTTP condition ${error.code} on ${this.describeRequest()}: ${error.message}`,
                LogType.ERROR,
            );
        } else {
            this.context.logger.log(error.stack ?? `${error.name}: ${error.message}`, LogType.ERROR);
        }
        this.respondSafely(HttpStatusCode.INTERNAL_SERVER_ERROR);
    }

    private respondSafely(statusCode: number): void {
        try {
            this.sendResponse(statusCode);
        } catch (err: unknown) {
            const error = toError(err);
            this.context.logger.log(
                `Could not send ${statusCode} for ${this.describeRequest()}: ${error.message}`,
                LogType.ERROR,
            );
        }
    }

    private canRespond(caller: string): boolean {
        if (this.state === 'processing' || this.state === 'handling' || this.state === 'finishing') {
            return true;
        }
        this.context.logger.log(
            `${caller}() ignored on ${this.describeRequest()}: resource is ${this.state}`,
            LogType.WARN,
        );
        return false;
    }

    private transmit(): void {
        const conn = this.conn;
        if (!conn) {
            throw new Error('No connection in flight on this resource');
        }

        const response = this.generateResponse();
        this.write(response.raw(), true);
        this.writeBuffer.gather(this.writeBuffer.totalBytes());

        this.state = 'sent';
        this.cancelDeadline();
        conn.write(this.writeBuffer.popLeft(), () => this.clear());
    }

    /**
     * Snapshot status and headers into the response head. Header changes
     * after this call need another generateResponse().
     */
    private generateResponse(): HttpResponse {
        this.response = new HttpResponse(
            this.statusCode ?? HttpStatusCode.OK,
            this.responseHeader.toMapping(),
            this.currentRequest,
        );
        return this.response;
    }

    private clear(): void {
        if (this.state === 'cleared') {
            return;
        }
        this.conn?.close();
        this.logAccess();
        this.state = 'cleared';
        this.conn = undefined;
        this.currentRequest = undefined;
        this.flushBuffer();
        this.responseHeader.clear();
        this.cancelDeadline();
    }

    private flushBuffer(): void {
        this.writeBuffer = new WriteBuffer();
    }

    private logAccess(): void {
        if (this.currentRequest && this.response) {
            this.context.logger.log(
                `${this.currentRequest.method.toUpperCase()} ${this.currentRequest.url} ${this.response.statusCode}`,
                LogType.ACCESS,
            );
        }
    }

    private armDeadline(): void {
        const deadlineMs = this.context.deadlineMs;
        if (deadlineMs <= 0 || this.state !== 'handling') {
            return;
        }
        this.deadline = setTimeout(() => {
            this.deadline = undefined;
            if (this.state !== 'handling') {
                return;
            }
            this.context.logger.log(
                `${this.describeRequest()} did not finish within ${deadlineMs}ms`,
                LogType.ERROR,
            );
            this.respondSafely(HttpStatusCode.INTERNAL_SERVER_ERROR);
        }, deadlineMs);
    }

    private cancelDeadline(): void {
        if (this.deadline) {
            clearTimeout(this.deadline);
            this.deadline = undefined;
        }
    }

    private isHeadRequest(): boolean {
        return this.currentRequest?.method.toLowerCase() === 'head';
    }

    private describeRequest(): string {
        if (!this.currentRequest) {
            return 'idle resource';
        }
        return `${this.currentRequest.method.toUpperCase()} ${this.currentRequest.url}`;
    }
}
