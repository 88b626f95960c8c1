import { ContainerModule } from 'inversify';
import { Path, WebAppMeta, path } from '@wind/http-routing';
import { NoteStore } from './notes/NoteStore';
import { GreetingService } from './greetings/GreetingService';
import { LocalGreetingService } from './greetings/LocalGreetingService';
import { greetingResource } from './resources/GreetingResource';
import { HelloResource, helloWind } from './resources/HelloResource';
import { notesResource } from './resources/NotesResource';

/**
 * ProdServerMeta - Application metadata and configuration.
 *
 * This is the entry point WindFactory calls to configure the application:
 * 1. DI modules (Inversify modules)
 * 2. The route table
 *
 * Usage:
 * ```typescript
 * const server = await WindFactory.create(new ProdServerMeta(), WindConfig.fromEnv());
 * await server.start();
 * ```
 */
export class ProdServerMeta implements WebAppMeta {
    constructor(
        private readonly greetings: GreetingService = new LocalGreetingService(),
        private readonly notes: NoteStore = new NoteStore(),
    ) {}

    getDIModules(): ContainerModule[] {
        return [];
    }

    getPaths(): Path[] {
        return [
            path(helloWind, '/', ['get', 'head']),
            path(HelloResource, '/resource', ['get']),
            path(greetingResource(this.greetings), '/greeting', ['get']),
            path(notesResource(this.notes), '/notes', ['get', 'post']),
        ];
    }
}
