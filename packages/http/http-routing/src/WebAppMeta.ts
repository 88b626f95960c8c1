import { ContainerModule } from 'inversify';
import { Path } from './Path';

/**
 * Main application metadata interface.
 *
 * This is the entry point WindFactory calls to configure your application.
 */
export interface WebAppMeta {
    /**
     * Inversify container modules for the application's own services.
     * Loaded after the framework bindings and before test overrides.
     */
    getDIModules(): ContainerModule[];

    /**
     * The ordered route table.
     */
    getPaths(): Path[];
}

/**
 * DI token for WebAppMeta injection.
 */
export const WEBAPP_META_TOKEN = Symbol.for('WebAppMeta');
