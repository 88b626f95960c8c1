import { ConsoleLogger, WindLogger } from '@wind/core-util';

/**
 * Collaborators every Resource created by a binding receives.
 */
export class ResourceContext {
    constructor(
        public logger: WindLogger = new ConsoleLogger(),
        /**
         * How long an asynchronous resource may stay suspended before it is
         * answered with 500. Zero disables the deadline.
         */
        public deadlineMs: number = 0,
    ) {}
}
