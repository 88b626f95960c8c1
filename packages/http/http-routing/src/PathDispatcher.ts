import { ConfigurationError } from '@wind/http-api';
import { Path } from './Path';
import { ResourceContext } from './ResourceContext';

/**
 * PathDispatcher - The route table.
 *
 * Keeps bindings in registration order; lookup() returns the first one whose
 * route equals the request path. Duplicate routes are not rejected, the
 * earlier one simply wins.
 */
export class PathDispatcher {
    private readonly paths: Path[] = [];

    constructor(paths: readonly Path[], context?: ResourceContext) {
        if (!Array.isArray(paths) || !paths.every((entry) => entry instanceof Path)) {
            throw new ConfigurationError('PathDispatcher wants an array of Path');
        }
        this.paths.push(...paths);
        if (context) {
            for (const entry of this.paths) {
                entry.setContext(context);
            }
        }
    }

    lookup(url: string): Path | undefined {
        return this.paths.find((entry) => entry.route === url);
    }

    get size(): number {
        return this.paths.length;
    }
}
