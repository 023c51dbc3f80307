/**
 * @cache-endpoint/fastify
 */

export {
  default,
  REQUEST_PARAM,
  REPLY_PARAM,
  createCachedRouteFactory,
  resolveRouteArgs,
  type EndpointCachePluginOptions,
  type CachedRouteArgs,
  type CachedRouteHandler,
  type CachedRouteOptions,
  type CachedRouteFactory,
} from './plugin.mjs';
