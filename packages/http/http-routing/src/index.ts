/**
 * @wind/http-routing
 *
 * Route bindings, the route table and the per-request Resource.
 */

export {
    Resource,
    ResourceState,
    ResponseChunk,
    JsonBody,
    RequestFunction,
    RouteBinding,
} from './Resource';
export { ResourceContext } from './ResourceContext';
export { Path, path, PathHandler, ResourceClass, HandlerBinding } from './Path';
export { PathDispatcher } from './PathDispatcher';
export { WebAppMeta, WEBAPP_META_TOKEN } from './WebAppMeta';
