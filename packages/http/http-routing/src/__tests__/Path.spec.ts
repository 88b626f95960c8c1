import { ConfigurationError, HttpRequest, MockConnection, WindRequest } from '@wind/http-api';
import { LogType, MemoryLogger } from '@wind/core-util';
import { Path, path } from '../Path';
import { PathDispatcher } from '../PathDispatcher';
import { Resource } from '../Resource';
import { ResourceContext } from '../ResourceContext';

class CounterResource extends Resource {
    static created = 0;
    protected asynchronous = false;

    initialize(): void {
        CounterResource.created++;
    }

    handleGet(): void {
        this.write(`instance ${CounterResource.created}`);
    }
}

describe('Path', () => {
    it('should lowercase and keep the allowed methods', () => {
        const binding = path(() => 'ok', '/items', ['GET', 'Post']);

        expect(binding.route).toBe('/items');
        expect(binding.methods).toEqual(['get', 'post']);
        expect(binding.allowed('get')).toBe(true);
        expect(binding.allowed('delete')).toBe(false);
        expect(binding.isErrorPath).toBe(false);
    });

    it('should reject unsupported methods at construction', () => {
        expect(() => path(() => 'ok', '/items', ['get', 'patch'])).toThrow(ConfigurationError);
        expect(() => path(() => 'ok', '/items', ['get', 'patch'])).toThrow("Unsupported HTTP method 'patch'");
    });

    it('should require methods when a route is given', () => {
        expect(() => new Path(() => 'ok', '/items')).toThrow("Route '/items' needs at least one allowed method");
    });

    it('should reject a class that does not extend Resource', () => {
        class Standalone {
            handleGet(): string {
                return 'never routed';
            }
        }

        const build = (): unknown => Reflect.construct(Path, [Standalone, '/standalone', ['get']]);

        expect(build).toThrow(ConfigurationError);
        expect(build).toThrow("Handler class 'Standalone' must extend Resource");
    });

    it('should treat a routeless path as the error path', () => {
        const binding = new Path(() => 'fallback');

        expect(binding.isErrorPath).toBe(true);
        expect(binding.route).toBeUndefined();
        expect(binding.allowed('get')).toBeUndefined();
    });

    it('should tag handlers by kind', () => {
        expect(path(() => 'ok', '/fn', ['get']).handlerKind).toBe('function');
        expect(path(CounterResource, '/resource', ['get']).handlerKind).toBe('resource');
    });

    it('should create a fresh resource per request', async () => {
        CounterResource.created = 0;
        const logger = new MemoryLogger();
        const binding = path(CounterResource, '/count', ['get']);
        binding.setContext(new ResourceContext(logger));

        const first = new MockConnection();
        const second = new MockConnection();
        await binding.follow(first, new WindRequest('GET', '/count'));
        await binding.follow(second, new WindRequest('GET', '/count'));

        expect(first.response().body).toBe('instance 1');
        expect(second.response().body).toBe('instance 2');
        expect(logger.messages(LogType.ACCESS)).toEqual(['GET /count 200', 'GET /count 200']);
    });

    it('should call a function handler once per request with that request', async () => {
        const handler = jest.fn((request: HttpRequest) => `you asked for ${request.url}`);
        const binding = path(handler, '/echo', ['get']);
        binding.setContext(new ResourceContext(new MemoryLogger()));

        const conn = new MockConnection();
        await binding.follow(conn, new WindRequest('GET', '/echo?x=1'));

        expect(handler).toHaveBeenCalledTimes(1);
        expect(conn.response().body).toBe('you asked for /echo?x=1');
    });
});

describe('PathDispatcher', () => {
    it('should return the first binding with an equal route', () => {
        const root = path(() => 'root', '/', ['get']);
        const first = path(() => 'first', '/dup', ['get']);
        const second = path(() => 'second', '/dup', ['post']);
        const dispatcher = new PathDispatcher([root, first, second]);

        expect(dispatcher.lookup('/')).toBe(root);
        expect(dispatcher.lookup('/dup')).toBe(first);
        expect(dispatcher.size).toBe(3);
    });

    it('should match routes exactly', () => {
        const dispatcher = new PathDispatcher([path(() => 'items', '/items', ['get'])]);

        expect(dispatcher.lookup('/items/')).toBeUndefined();
        expect(dispatcher.lookup('/ITEMS')).toBeUndefined();
        expect(dispatcher.lookup('/missing')).toBeUndefined();
    });

    it('should reject anything but an array of Path', () => {
        const build = (): unknown => Reflect.construct(PathDispatcher, [[{ route: '/' }]]);

        expect(build).toThrow(ConfigurationError);
        expect(build).toThrow('PathDispatcher wants an array of Path');
    });
});
