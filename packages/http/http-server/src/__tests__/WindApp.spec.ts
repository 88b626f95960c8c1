import { createHash } from 'crypto';
import { LogType, MemoryLogger } from '@wind/core-util';
import { ConfigurationError, MockConnection, RequestHeaderMap, WindRequest } from '@wind/http-api';
import { Resource, ResourceContext, path } from '@wind/http-routing';
import { WindApp } from '../WindApp';

class HelloResource extends Resource {
    handleGet(): void {
        this.write('hello wind!');
        this.finish();
    }
}

function md5(text: string): string {
    return createHash('md5').update(text).digest('hex');
}

describe('WindApp', () => {
    let logger: MemoryLogger;
    let app: WindApp;

    beforeEach(() => {
        logger = new MemoryLogger();
        app = new WindApp(
            [
                path(() => 'hello wind!', '/', ['get']),
                path(HelloResource, '/resource', ['get']),
                path(
                    () => {
                        throw new Error('kaboom');
                    },
                    '/boom',
                    ['get'],
                ),
            ],
            new ResourceContext(logger),
        );
    });

    it('should answer a function route with a 200 and an ETag', async () => {
        const conn = new MockConnection();

        await app.react(conn, new WindRequest('GET', '/'));

        expect(conn.writes[0].toString()).toBe(
            'HTTP/1.1 200 OK\r\n' +
                'Content-Type: text/plain; charset=utf-8\r\n' +
                `ETag: ${md5('hello wind!')}\r\n` +
                'Content-Length: 11\r\n' +
                '\r\n' +
                'hello wind!',
        );
        expect(conn.closed).toBe(true);
        expect(logger.messages(LogType.ACCESS)).toEqual(['GET / 200']);
    });

    it('should answer 404 for an unknown path whatever the method', async () => {
        const get = new MockConnection();
        const post = new MockConnection();

        await app.react(get, new WindRequest('GET', '/missing'));
        await app.react(post, new WindRequest('POST', '/missing'));

        const expected = 'HTTP/1.1 404 Not Found\r\nContent-Type: text/plain; charset=utf-8\r\nContent-Length: 3\r\n\r\n404';
        expect(get.writes[0].toString()).toBe(expected);
        expect(post.writes[0].toString()).toBe(expected);
        expect(logger.messages(LogType.ERROR)).toEqual([]);
    });

    it('should answer 405 for a method the route does not allow', async () => {
        const conn = new MockConnection();

        await app.react(conn, new WindRequest('POST', '/'));

        expect(conn.response().statusCode).toBe(405);
        expect(logger.messages(LogType.ACCESS)).toEqual(['POST / 405']);
    });

    it('should answer 304 when the client repeats the ETag it was given', async () => {
        const first = new MockConnection();
        await app.react(first, new WindRequest('GET', '/resource'));
        const etag = first.response().headers.get('ETag');
        expect(etag).toBe(md5('hello wind!'));

        const second = new MockConnection();
        await app.react(
            second,
            new WindRequest('GET', '/resource', new RequestHeaderMap([['If-None-Match', md5('hello wind!')]])),
        );

        expect(second.response().statusCode).toBe(304);
        expect(second.response().body).toBe('');
        expect(logger.messages(LogType.ACCESS)).toEqual(['GET /resource 200', 'GET /resource 304']);
    });

    it('should answer 500, log once and close the connection when a handler throws', async () => {
        const conn = new MockConnection();

        await app.react(conn, new WindRequest('GET', '/boom'));

        expect(conn.response().statusCode).toBe(500);
        expect(conn.closed).toBe(true);
        const errors = logger.messages(LogType.ERROR);
        expect(errors).toHaveLength(1);
        expect(errors[0]).toContain('Error: kaboom');
    });

    it('should look routes up without the query string', async () => {
        const conn = new MockConnection();

        await app.react(conn, new WindRequest('GET', '/resource?lang=en'));

        expect(conn.response().body).toBe('hello wind!');
        expect(logger.messages(LogType.ACCESS)).toEqual(['GET /resource?lang=en 200']);
    });

    it('should refuse anything that is not a request', () => {
        const notARequest: unknown = { path: '/' };

        expect(() => Reflect.apply(app.react, app, [new MockConnection(), notARequest])).toThrow(ConfigurationError);
    });
});
