import { Container, ContainerModule } from 'inversify';
import { ConsoleLogger, LOGGER_TOKEN, WindLogger } from '@wind/core-util';
import { WebAppMeta, WEBAPP_META_TOKEN } from '@wind/http-routing';
import { WindConfig, WIND_CONFIG_TOKEN } from './WindConfig';
import { WindServer } from './WindServer';
import { WindServerImpl } from './WindServerImpl';

/**
 * WindFactory - Creates wind server instances.
 *
 * Validates the config, builds the framework container, resolves
 * WindServerImpl from it and initializes it. The returned WindServer hides
 * initialize() from consumers.
 *
 * Usage:
 * ```typescript
 * // Production
 * const server = await WindFactory.create(new ProdServerMeta(), WindConfig.fromEnv());
 * await server.start();
 *
 * // Testing with appOverrides
 * const appOverrides = new ContainerModule((options) => {
 *     options.bind<WindLogger>(LOGGER_TOKEN).toConstantValue(new MemoryLogger());
 * });
 * const server = await WindFactory.create(new ProdServerMeta(), new WindConfig(), appOverrides);
 * ```
 */
export class WindFactory {
    /**
     * @param meta - Application DI modules and route table
     * @param config - Validated before anything is created
     * @param appOverrides - Loaded LAST into the application container
     */
    static async create(
        meta: WebAppMeta,
        config: WindConfig = new WindConfig(),
        appOverrides?: ContainerModule,
    ): Promise<WindServer> {
        config.validate();

        const windContainer = new Container();
        windContainer.bind<WebAppMeta>(WEBAPP_META_TOKEN).toConstantValue(meta);
        windContainer.bind<WindConfig>(WIND_CONFIG_TOKEN).toConstantValue(config);
        windContainer.bind<WindLogger>(LOGGER_TOKEN).toConstantValue(new ConsoleLogger());
        windContainer.bind<WindServerImpl>(WindServerImpl).toSelf().inSingletonScope();

        const serverImpl = windContainer.get(WindServerImpl);
        await serverImpl.initialize(windContainer, appOverrides);

        return serverImpl;
    }
}
