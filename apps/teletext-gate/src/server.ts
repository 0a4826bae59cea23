import Fastify, { type FastifyInstance, type FastifyReply, type FastifyServerOptions } from 'fastify';
import type { TeletextGateConfig } from './config.js';
import { createUpstreamClient, type PageRequest, type UpstreamClient } from './upstream.js';

const PAGE_NAME_PATTERN = /^(\d{3})_(\d{4})$/;

interface PageParams {
  name: string;
}

interface ServerDependencies {
  config: TeletextGateConfig;
  upstream?: UpstreamClient;
  logger?: FastifyServerOptions['logger'];
}

export function parsePageRequest(name: string): PageRequest | null {
  const match = PAGE_NAME_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  const number = Number.parseInt(match[1], 10);
  const subpage = Number.parseInt(match[2], 10);
  if (number < 100 || subpage < 1) {
    return null;
  }
  return { page: match[1], subpage: match[2] };
}

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const { config } = deps;
  const fastify = Fastify({
    logger: deps.logger ?? true,
  });
  const upstream =
    deps.upstream ?? createUpstreamClient({ urlTemplate: config.upstreamUrl, timeoutMs: config.requestTimeoutMs });

  const allowOrigin = (reply: FastifyReply) => {
    reply.header('access-control-allow-origin', config.allowedOrigin);
    reply.header('vary', 'origin');
  };

  fastify.get('/healthz', async () => ({ status: 'ok' }));

  fastify.options<{ Params: PageParams }>('/pages/:name', async (_request, reply) => {
    allowOrigin(reply);
    reply.header('access-control-allow-methods', 'GET, OPTIONS');
    reply.header('access-control-max-age', '600');
    return reply.code(204).send();
  });

  fastify.get<{ Params: PageParams }>('/pages/:name', async (request, reply) => {
    allowOrigin(reply);
    const pageRequest = parsePageRequest(request.params.name);
    if (!pageRequest) {
      return reply.code(400).send({ error: 'invalid_page_name' });
    }

    const result = await upstream.fetchPage(pageRequest);
    switch (result.kind) {
      case 'ok':
        reply.header('content-type', result.contentType);
        reply.header('cache-control', `public, max-age=${config.cacheMaxAgeSeconds}`);
        return reply.send(result.body);
      case 'not_found':
        return reply.code(404).send({ error: 'not_found' });
      case 'timeout':
        request.log.warn({ page: request.params.name }, 'upstream timed out');
        return reply.code(504).send({ error: 'upstream_timeout' });
      case 'bad_status':
        request.log.warn({ page: request.params.name, status: result.status }, 'upstream returned an error');
        return reply.code(502).send({ error: 'upstream_error', status: result.status });
      case 'unreachable':
        request.log.error({ page: request.params.name, message: result.message }, 'upstream unreachable');
        return reply.code(502).send({ error: 'upstream_unreachable' });
      default:
        return reply.code(500).send({ error: 'internal_error' });
    }
  });

  return fastify;
}
