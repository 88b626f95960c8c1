/**
 * Error normalization used by every catch block in wind.
 *
 * A handler may throw anything: an Error, a rejected string, a plain object.
 * Catch blocks call toError() first so logging and status mapping always
 * work against a real Error with a stack:
 * ```typescript
 * try {
 *     await resource.handleGet();
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     logger.log(error.stack ?? error.message, LogType.ERROR);
 * }
 * ```
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        if ('message' in err) {
            const error = new Error(String(err.message));
            if ('stack' in err && typeof err.stack === 'string') {
                error.stack = err.stack;
            }
            if ('name' in err && typeof err.name === 'string') {
                error.name = err.name;
            }
            return error;
        }

        try {
            return new Error(`Non-Error object thrown: ${JSON.stringify(err)}`);
        } catch (stringifyErr: unknown) {
            // no toError() here, it would recurse on the same circular value
            void stringifyErr;
            return new Error('Non-Error object thrown (unable to stringify)');
        }
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}
