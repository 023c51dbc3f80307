/**
 * Fastify plugin for @cache-endpoint/core
 *
 * Registers one process-wide EndpointCache on the Fastify instance and turns
 * cacheable operations into route handlers.
 */
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import {
  EndpointCache,
  REQUEST_TYPE,
  RESPONSE_TYPE,
  cached,
  type CacheLogger,
  type CacheOptions,
  type CacheStore,
  type EndpointCacheConfig,
  type OutboundResponse,
  type ParameterDeclaration,
} from '@cache-endpoint/core';

/** Parameter name resolving to the Fastify request */
export const REQUEST_PARAM = 'request';
/** Parameter name resolving to the Fastify reply */
export const REPLY_PARAM = 'reply';

/**
 * Plugin options
 */
export interface EndpointCachePluginOptions {
  /** Cache configuration; `url` may be omitted when `store` is given */
  config?: EndpointCacheConfig;
  /** Store instance, e.g. a MemoryCacheStore in tests */
  store?: CacheStore;
  /** Logger for cache events. Default: fastify.log */
  logger?: CacheLogger;
}

export type CachedRouteArgs = Record<string, unknown>;

export type CachedRouteHandler = (args: CachedRouteArgs) => unknown;

export type CachedRouteOptions = Omit<CacheOptions, 'method'>;

export type CachedRouteFactory = (
  options: CachedRouteOptions,
  handler: CachedRouteHandler
) => (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

function readField(source: unknown, name: string): unknown {
  if (typeof source !== 'object' || source === null || !Object.hasOwn(source, name)) {
    return undefined;
  }
  return Reflect.get(source, name);
}

/**
 * `request` and `reply` are typed as Request/Response unless declared otherwise,
 * which keeps them out of the key
 */
function withHostTypes(params: readonly ParameterDeclaration[]): ParameterDeclaration[] {
  return params.map((param) => {
    if (param.type !== undefined) return param;
    if (param.name === REQUEST_PARAM) return { ...param, type: REQUEST_TYPE };
    if (param.name === REPLY_PARAM) return { ...param, type: RESPONSE_TYPE };
    return param;
  });
}

/**
 * Resolve declared parameters from the request: route params first, then query string
 */
export function resolveRouteArgs(
  params: readonly ParameterDeclaration[],
  request: FastifyRequest,
  reply: FastifyReply
): CachedRouteArgs {
  const args: CachedRouteArgs = {};
  for (const { name } of params) {
    if (name === REQUEST_PARAM) {
      args[name] = request;
    } else if (name === REPLY_PARAM) {
      args[name] = reply;
    } else {
      args[name] = readField(request.params, name) ?? readField(request.query, name);
    }
  }
  return args;
}

function toOutboundResponse(reply: FastifyReply): OutboundResponse {
  return {
    setHeader: (name, value) => {
      reply.header(name, value);
    },
    setStatus: (code) => {
      reply.code(code);
    },
  };
}

/**
 * Build the `cachedRoute` decorator bound to one cache
 */
export function createCachedRouteFactory(cache: EndpointCache): CachedRouteFactory {
  return (options, handler) => {
    const operation = cached<CachedRouteArgs, unknown>(
      { ...options, params: withHostTypes(options.params ?? []) },
      handler
    );

    return async (request, reply) => {
      const outcome = await cache.handle(operation, {
        args: resolveRouteArgs(operation.params, request, reply),
        method: request.method,
        headers: request.headers,
        response: toOutboundResponse(reply),
      });

      if (outcome.status === 'not-modified') {
        return reply.send();
      }
      return outcome.payload;
    };
  };
}

/**
 * Fastify plugin for endpoint caching
 *
 * @example
 * ```typescript
 * import Fastify from 'fastify';
 * import endpointCachePlugin from '@cache-endpoint/fastify';
 *
 * const fastify = Fastify({ logger: true });
 *
 * await fastify.register(endpointCachePlugin, {
 *   config: { url: 'redis://localhost:6379', prefix: 'myapi' },
 * });
 *
 * fastify.get(
 *   '/users/:id',
 *   fastify.cachedRoute(
 *     { namespace: 'api', name: 'get_user', params: [{ name: 'id' }, { name: 'request' }], expire: 3600 },
 *     async ({ id }) => loadUser(Number(id))
 *   )
 * );
 * ```
 */
const endpointCachePlugin: FastifyPluginAsync<EndpointCachePluginOptions> = async (
  fastify: FastifyInstance,
  options: EndpointCachePluginOptions
) => {
  const cache = new EndpointCache(options.config ?? {}, {
    store: options.store,
    logger: options.logger ?? fastify.log,
  });

  const status = await cache.connect();
  if (status !== 'connected') {
    fastify.log.warn({ status }, 'Cache store unavailable; cached routes will be served uncached');
  }

  if (fastify.hasDecorator('endpointCache')) {
    throw new Error("Decorator 'endpointCache' already exists");
  }

  fastify.decorate('endpointCache', cache);
  fastify.decorate('cachedRoute', createCachedRouteFactory(cache));

  fastify.addHook('onClose', async () => {
    await cache.close();
    fastify.log.info('endpoint cache closed');
  });
};

export default fp(endpointCachePlugin, {
  name: 'cache-endpoint',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    endpointCache: EndpointCache;
    cachedRoute: CachedRouteFactory;
  }
}
