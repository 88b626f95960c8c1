import { Connection, ConfigurationError, HttpRequest, isHttpMethod } from '@wind/http-api';
import { RequestFunction, Resource, RouteBinding } from './Resource';
import { ResourceContext } from './ResourceContext';

/**
 * A Resource subclass; instantiated once per request.
 */
export type ResourceClass = new (path: RouteBinding, context: ResourceContext) => Resource;

export type PathHandler = RequestFunction | ResourceClass;

/**
 * How a binding produces the Resource for a request.
 */
export type HandlerBinding =
    | { kind: 'resource'; resourceClass: ResourceClass }
    | { kind: 'function'; fn: RequestFunction };

function isResourceClass(handler: PathHandler): handler is ResourceClass {
    return handler === Resource || handler.prototype instanceof Resource;
}

function isClassConstructor(handler: PathHandler): boolean {
    return /^class[\s{]/.test(Function.prototype.toString.call(handler));
}

/**
 * Path - Binds a route and its allowed methods to a handler.
 *
 * The handler is either a Resource subclass or a plain function returning the
 * response body. A Path without a route is the error path: the fallback the
 * app follows when no route matches, which skips the method check.
 *
 * Routes are matched by exact string equality; patterns are not supported.
 */
export class Path implements RouteBinding {
    private readonly handler: HandlerBinding;
    private readonly _route?: string;
    private readonly _methods: ReadonlySet<string>;
    private context = new ResourceContext();

    constructor(handler: PathHandler, route?: string, methods?: readonly string[]) {
        if (typeof handler !== 'function') {
            throw new ConfigurationError('Request handler registered to app should be callable');
        }
        if (!isResourceClass(handler) && isClassConstructor(handler)) {
            throw new ConfigurationError(`Handler class '${handler.name}' must extend Resource`);
        }
        this.handler = isResourceClass(handler)
            ? { kind: 'resource', resourceClass: handler }
            : { kind: 'function', fn: handler };

        this._route = route;
        if (route === undefined) {
            this._methods = new Set();
            return;
        }
        if (!methods || methods.length === 0) {
            throw new ConfigurationError(`Route '${route}' needs at least one allowed method`);
        }
        this._methods = new Set(methods.map((method) => Path.validateMethod(method.toLowerCase())));
    }

    get route(): string | undefined {
        return this._route;
    }

    get methods(): string[] {
        return [...this._methods];
    }

    get isErrorPath(): boolean {
        return this._route === undefined;
    }

    get handlerKind(): HandlerBinding['kind'] {
        return this.handler.kind;
    }

    /**
     * Attach the logger and deadline handed to every Resource this path
     * creates. Called by PathDispatcher and WindApp on registration.
     */
    setContext(context: ResourceContext): void {
        this.context = context;
    }

    /**
     * Whether `method` (lowercase) is allowed. Undefined on the error path.
     */
    allowed(method: string): boolean | undefined {
        if (this.isErrorPath) {
            return undefined;
        }
        return this._methods.has(method);
    }

    /**
     * Create this request's Resource and let it react.
     */
    follow(conn: Connection, request: HttpRequest): Promise<void> {
        return this.createResource().react(conn, request);
    }

    private createResource(): Resource {
        let resource: Resource;
        if (this.handler.kind === 'resource') {
            resource = new this.handler.resourceClass(this, this.context);
        } else {
            resource = new Resource(this, this.context);
            resource.inject(this.handler.fn);
        }
        resource.initialize();
        return resource;
    }

    private static validateMethod(method: string): string {
        if (!isHttpMethod(method)) {
            throw new ConfigurationError(`Unsupported HTTP method '${method}'`);
        }
        return method;
    }
}

/**
 * Shorthand for `new Path(handler, route, methods)`.
 *
 * ```typescript
 * const app = new WindApp([
 *     path((request) => 'hello wind!', '/', ['get']),
 *     path(HelloResource, '/resource', ['get']),
 * ]);
 * ```
 */
export function path(handler: PathHandler, route: string, methods: readonly string[]): Path {
    return new Path(handler, route, methods);
}
