import * as net from 'net';
import { Container, ContainerModule, inject, injectable } from 'inversify';
import { LOGGER_TOKEN, LogType, WindLogger, toError } from '@wind/core-util';
import { HttpError, HttpResponse, HttpStatusCode, ResponseHeaderSet, WindRequest } from '@wind/http-api';
import { WEBAPP_META_TOKEN, WebAppMeta } from '@wind/http-routing';
import { WindApp } from './WindApp';
import { WindConfig, WIND_CONFIG_TOKEN } from './WindConfig';
import { WindServer } from './WindServer';
import { WindModule } from './modules/WindModule';
import { RequestHeadParser } from './transport/RequestHeadParser';
import { ClientSocket, SocketConnection } from './transport/SocketConnection';

/**
 * WindServerImpl - Internal server implementation.
 *
 * Created by WindFactory.create(). Two containers are involved:
 * 1. windContainer: framework bindings (meta, config, logger)
 * 2. appContainer: WindModule plus the application's modules and test
 *    overrides (child of windContainer)
 *
 * Each accepted socket carries one request: its bytes are parsed into a
 * WindRequest and handed to WindApp, and the resource closes the socket once
 * the response is written.
 */
@injectable()
export class WindServerImpl implements WindServer {
    private appContainer?: Container;
    private app?: WindApp;
    private server?: net.Server;

    constructor(
        @inject(WEBAPP_META_TOKEN) private readonly meta: WebAppMeta,
        @inject(WIND_CONFIG_TOKEN) private readonly config: WindConfig,
        @inject(LOGGER_TOKEN) private logger: WindLogger,
    ) {}

    /**
     * Load the DI modules and resolve the app.
     * Called by WindFactory.create(); not part of the WindServer interface.
     *
     * @param overrides - Loaded LAST so tests can replace bindings
     */
    async initialize(windContainer: Container, overrides?: ContainerModule): Promise<void> {
        if (this.app) {
            return;
        }

        const appContainer = new Container({ parent: windContainer });
        await appContainer.load(WindModule);
        for (const module of this.meta.getDIModules()) {
            await appContainer.load(module);
        }
        if (overrides) {
            await appContainer.load(overrides);
        }

        this.appContainer = appContainer;
        this.logger = appContainer.get<WindLogger>(LOGGER_TOKEN);
        this.app = appContainer.get(WindApp);
    }

    async start(port: number = this.config.port): Promise<void> {
        if (!this.app) {
            throw new Error('Server not initialized. Call initialize() before start().');
        }
        if (this.server) {
            return;
        }

        const server = this.createListener();
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(port, this.config.host, () => {
                server.off('error', reject);
                resolve();
            });
        });
        this.server = server;

        const address = server.address();
        const bound = address !== null && typeof address === 'object' ? address.port : port;
        this.logger.log(`[WindServer] Listening on http://${this.config.host}:${bound}`, LogType.INFO);
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = undefined;

        await new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve();
            });
        });
        this.logger.log('[WindServer] Stopped', LogType.INFO);
    }

    getApp(): WindApp {
        if (!this.app) {
            throw new Error('Server not initialized. Call initialize() before use.');
        }
        return this.app;
    }

    getContainer(): Container {
        if (!this.appContainer) {
            throw new Error('Server not initialized. Call initialize() before use.');
        }
        return this.appContainer;
    }

    /**
     * An unbound net.Server whose connections go to handleConnection().
     * Errors raised after listening started (EMFILE on accept, for example)
     * are logged instead of crashing the process.
     */
    createListener(): net.Server {
        const server = net.createServer((socket) => this.handleConnection(socket));
        server.on('error', (err: Error) => {
            this.logger.log(`[WindServer] Server error: ${err.message}`, LogType.ERROR);
        });
        return server;
    }

    /**
     * Read one request from `socket` and dispatch it.
     */
    handleConnection(socket: ClientSocket): void {
        const parser = new RequestHeadParser(this.config.maxHeaderBytes, this.config.maxBodyBytes);
        const conn = new SocketConnection(socket, this.logger);

        const onData = (data: Buffer): void => {
            let request: WindRequest | undefined;
            try {
                request = parser.push(data);
            } catch (err: unknown) {
                socket.off('data', onData);
                this.rejectMalformed(socket, toError(err));
                return;
            }
            if (request) {
                socket.off('data', onData);
                void this.dispatch(conn, request);
            }
        };

        socket.on('data', onData);
        socket.on('error', (err: Error) => {
            this.logger.log(`[WindServer] Socket error: ${err.message}`, LogType.WARN);
        });
    }

    private async dispatch(conn: SocketConnection, request: WindRequest): Promise<void> {
        try {
            await this.getApp().react(conn, request);
        } catch (err: unknown) {
            const error = toError(err);
            this.logger.log(`[WindServer] ${request.method} ${request.url} failed: ${error.stack ?? error.message}`, LogType.ERROR);
            conn.close();
        }
    }

    private rejectMalformed(socket: ClientSocket, error: Error): void {
        const status = error instanceof HttpError ? error.code : HttpStatusCode.BAD_REQUEST;
        this.logger.log(`[WindServer] Rejected request: ${error.message}`, LogType.WARN);

        const headers = new ResponseHeaderSet();
        headers.addContentLength(0);
        const head = new HttpResponse(status, headers.toMapping()).raw();
        socket.write(Buffer.from(head, 'latin1'), () => {
            socket.end();
        });
    }
}
