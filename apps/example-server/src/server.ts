import 'reflect-metadata';
import { toError } from '@wind/core-util';
import { WindConfig, WindFactory } from '@wind/http-server';
import { ProdServerMeta } from './ProdServerMeta';

/**
 * Main entry point for the application.
 * Reads WIND_* environment variables, starts listening and stops on
 * SIGTERM or SIGINT.
 */
async function main(): Promise<void> {
    try {
        console.log('[Server] Starting wind server...');
        const server = await WindFactory.create(new ProdServerMeta(), WindConfig.fromEnv());
        await server.start();

        await new Promise<void>((resolve) => {
            process.once('SIGTERM', () => {
                console.log('[Server] Received SIGTERM signal, shutting down...');
                resolve();
            });
            process.once('SIGINT', () => {
                console.log('[Server] Received SIGINT signal, shutting down...');
                resolve();
            });
        });

        await server.stop();
    } catch (err: unknown) {
        const error = toError(err);
        console.error('[Server] Server failed:', error.message);
        process.exit(1);
    }
}

if (require.main === module) {
    void main();
}

export { main };
