import { Resource, ResourceClass } from '@wind/http-routing';
import { GreetingRequest, GreetingService } from '../greetings/GreetingService';

/**
 * GET /greeting?name=... - waits for the greeting service and answers with
 * its text as JSON.
 */
export function greetingResource(greetings: GreetingService): ResourceClass {
    return class GreetingResource extends Resource {
        async handleGet(): Promise<void> {
            const request = new GreetingRequest();
            request.name = this.queryParam('name');

            const greeting = await greetings.greet(request);
            this.write({ greeting: greeting.text });
            this.finish();
        }

        private queryParam(name: string): string | undefined {
            const queryStart = this.request.url.indexOf('?');
            if (queryStart === -1) {
                return undefined;
            }
            return new URLSearchParams(this.request.url.substring(queryStart + 1)).get(name) ?? undefined;
        }
    };
}
