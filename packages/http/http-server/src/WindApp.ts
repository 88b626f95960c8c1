import { ConfigurationError, Connection, HttpNotFoundError, HttpRequest, isHttpRequest } from '@wind/http-api';
import { Path, PathDispatcher, ResourceContext } from '@wind/http-routing';

/**
 * WindApp - Entry point for inbound requests.
 *
 * Looks the request path up in the route table and follows the matching
 * Path; an unmatched path is answered 404 through the error path.
 *
 * ```typescript
 * function helloWind(request: HttpRequest): string {
 *     return 'hello wind!';
 * }
 *
 * class HelloResource extends Resource {
 *     handleGet(): void {
 *         this.write('hello wind!');
 *         this.finish();
 *     }
 * }
 *
 * const app = new WindApp([
 *     path(helloWind, '/', ['get']),
 *     path(HelloResource, '/resource', ['get']),
 * ]);
 * ```
 */
export class WindApp {
    private readonly dispatcher: PathDispatcher;
    private readonly errorPath: Path;

    constructor(paths: readonly Path[], context: ResourceContext = new ResourceContext()) {
        this.dispatcher = new PathDispatcher(paths, context);
        this.errorPath = new Path(() => {
            throw new HttpNotFoundError();
        });
        this.errorPath.setContext(context);
    }

    /**
     * Resolves once the handler has returned; the response itself may still
     * be in flight on the connection.
     */
    react(conn: Connection, request: HttpRequest): Promise<void> {
        if (!isHttpRequest(request)) {
            throw new ConfigurationError('Can only react to HttpRequest');
        }

        const binding = this.dispatcher.lookup(request.path) ?? this.errorPath;
        return binding.follow(conn, request);
    }
}
