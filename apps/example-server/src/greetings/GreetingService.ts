/**
 * Who to greet. A missing name gets a generic greeting.
 */
export class GreetingRequest {
    name?: string;
}

export class Greeting {
    constructor(
        public text: string,
        /** Epoch milliseconds. */
        public issuedAt: number,
    ) {}
}

/**
 * Produces greetings for GET /greeting. Backed by a remote service in a real
 * deployment and replaced by a stub in tests.
 */
export interface GreetingService {
    greet(request: GreetingRequest): Promise<Greeting>;
}
