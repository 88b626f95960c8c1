/**
 * Status codes wind produces itself. Handlers may set any other numeric code
 * through Resource.setStatusCode().
 */
export const HttpStatusCode = {
    OK: 200,
    CREATED: 201,
    NO_CONTENT: 204,
    NOT_MODIFIED: 304,
    BAD_REQUEST: 400,
    NOT_FOUND: 404,
    METHOD_NOT_ALLOWED: 405,
    PAYLOAD_TOO_LARGE: 413,
    INTERNAL_SERVER_ERROR: 500,
} as const;

const REASON_PHRASES: Record<number, string> = {
    100: 'Continue',
    200: 'OK',
    201: 'Created',
    202: 'Accepted',
    204: 'No Content',
    301: 'Moved Permanently',
    302: 'Found',
    304: 'Not Modified',
    400: 'Bad Request',
    401: 'Unauthorized',
    403: 'Forbidden',
    404: 'Not Found',
    405: 'Method Not Allowed',
    408: 'Request Timeout',
    409: 'Conflict',
    413: 'Payload Too Large',
    500: 'Internal Server Error',
    501: 'Not Implemented',
    502: 'Bad Gateway',
    503: 'Service Unavailable',
};

export function reasonPhrase(code: number): string {
    return REASON_PHRASES[code] ?? 'Unknown';
}

/**
 * Statuses whose responses never carry a body.
 */
export function isBodyless(code: number): boolean {
    return (code >= 100 && code < 200) || code === 204 || code === 304;
}
