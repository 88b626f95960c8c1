/**
 * The HTTP methods a route may allow, in their lowercase form.
 */
export const HTTP_METHODS = ['get', 'post', 'put', 'delete', 'head'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
    return (HTTP_METHODS as readonly string[]).includes(value);
}
