import { Container } from 'inversify';
import { WindApp } from './WindApp';

/**
 * WindServer - Public interface for a wind server.
 *
 * Created by WindFactory.create(); the initialization logic stays hidden.
 *
 * Usage:
 * ```typescript
 * // Production
 * const server = await WindFactory.create(new ProdServerMeta(), WindConfig.fromEnv());
 * await server.start();
 *
 * // Testing (no sockets needed)
 * const server = await WindFactory.create(new ProdServerMeta(), new WindConfig(), overrides);
 * await server.getApp().react(new MockConnection(), new WindRequest('GET', '/'));
 * ```
 */
export interface WindServer {
    /**
     * Start listening. Resolves once the socket is bound.
     *
     * @param port - Overrides WindConfig.port
     */
    start(port?: number): Promise<void>;

    /**
     * Stop accepting connections. Resolves once the listener is closed.
     */
    stop(): Promise<void>;

    /**
     * The app that requests are dispatched to.
     */
    getApp(): WindApp;

    /**
     * The application DI container, for verification in tests.
     */
    getContainer(): Container;
}
