import { ContainerModule } from 'inversify';
import { LOGGER_TOKEN, WindLogger } from '@wind/core-util';
import { ResourceContext, WEBAPP_META_TOKEN, WebAppMeta } from '@wind/http-routing';
import { WindApp } from '../WindApp';
import { WindConfig, WIND_CONFIG_TOKEN } from '../WindConfig';

/**
 * WindModule - Framework-level bindings of the application container.
 *
 * Loaded by WindServerImpl BEFORE the application's modules, so an app
 * module or a test override can rebind the logger the resources get.
 */
export const WindModule = new ContainerModule((options) => {
    const { bind } = options;

    bind<WindApp>(WindApp)
        .toDynamicValue((context) => {
            const meta = context.get<WebAppMeta>(WEBAPP_META_TOKEN);
            const config = context.get<WindConfig>(WIND_CONFIG_TOKEN);
            const logger = context.get<WindLogger>(LOGGER_TOKEN);
            return new WindApp(meta.getPaths(), new ResourceContext(logger, config.requestTimeoutMs));
        })
        .inSingletonScope();
});
