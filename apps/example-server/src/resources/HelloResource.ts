import { HttpRequest } from '@wind/http-api';
import { Resource } from '@wind/http-routing';

/**
 * Function handler: the returned string is the body.
 */
export function helloWind(request: HttpRequest): string {
    return 'hello wind!';
}

export class HelloResource extends Resource {
    handleGet(): void {
        this.write('hello wind!');
        this.finish();
    }
}
