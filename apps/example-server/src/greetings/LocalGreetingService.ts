import { Greeting, GreetingRequest, GreetingService } from './GreetingService';

/**
 * Greets in-process; the default when no remote service is configured.
 */
export class LocalGreetingService implements GreetingService {
    async greet(request: GreetingRequest): Promise<Greeting> {
        return new Greeting(`Hello, ${request.name ?? 'stranger'}!`, Date.now());
    }
}
