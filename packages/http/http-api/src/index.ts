/**
 * @wind/http-api
 *
 * The HTTP vocabulary shared by routing and the transport: methods, status
 * codes, errors, the request and connection contracts, and response framing.
 */

export { HTTP_METHODS, HttpMethod, isHttpMethod } from './HttpMethod';
export { HttpStatusCode, reasonPhrase, isBodyless } from './HttpStatusCode';

// HTTP errors
export {
    HttpError,
    HttpNotModifiedError,
    HttpBadRequestError,
    HttpPayloadTooLargeError,
    HttpNotFoundError,
    HttpMethodNotAllowedError,
    HttpInternalServerError,
    ConfigurationError,
} from './errors';

export { HttpRequest, RequestHeaders, RequestHeaderMap, WindRequest, isHttpRequest } from './HttpRequest';
export { Connection } from './Connection';
export { MockConnection, CapturedResponse } from './MockConnection';
export { ResponseHeaderSet, DEFAULT_CONTENT_TYPE, JSON_CONTENT_TYPE } from './ResponseHeaderSet';
export { HttpResponse } from './HttpResponse';
