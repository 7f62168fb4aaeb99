import Fastify, {
  type FastifyInstance,
  type FastifyRequest
} from 'fastify';

import { isCgiError, type CgiError } from './cgiErrors.js';
import { detectScheme } from './dispatcher.js';
import { badRequest, forbidden, isGatewayError, notFound } from './errors.js';
import type { CgiClientConfig } from './loadConfig.js';
import { LocalCgiClient } from './localClient.js';
import type { Logger } from './logger.js';
import { getMetricsSnapshot } from './metrics.js';
import type { ProcessRunner } from './processRunner.js';

// Framing headers are recomputed by the server for the reply body.
const DROPPED_HEADERS = new Set(['content-length', 'transfer-encoding', 'connection']);

interface TargetParams {
  name: string;
}

export interface GatewayDependencies {
  runner: ProcessRunner;
}

export interface Gateway {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  instance: FastifyInstance;
}

/**
 * Serves the registered local targets over HTTP, so that a remote client
 * can reach the same program a local client runs.
 */
export function createGateway(config: CgiClientConfig, logger: Logger, deps: GatewayDependencies): Gateway {
  const fastify = Fastify({ logger: false });

  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    enforceLoopback(request);
  });

  fastify.get('/health', async () => ({
    status: 'ok',
    targets: Object.keys(config.targets).length
  }));

  fastify.get('/metrics', async () => getMetricsSnapshot());

  fastify.route<{ Params: TargetParams }>({
    method: ['GET', 'POST'],
    url: '/cgi/:name',
    handler: async (request, reply) => {
      const { name } = request.params;
      if (!Object.hasOwn(config.targets, name)) {
        throw notFound(`Unknown CGI target: ${name}`, 'UNKNOWN_TARGET');
      }
      const entry = config.targets[name];
      if (detectScheme(entry.target) !== '') {
        throw badRequest(`CGI target ${name} is not a local program`, 'REMOTE_TARGET');
      }

      const client = new LocalCgiClient(
        entry.target,
        { runner: deps.runner, logger },
        { environment: entry.environment }
      );
      const queryString = extractQueryString(request.url);
      const result =
        request.method === 'POST'
          ? await client.invoke({
              method: 'POST',
              queryString: queryString.length > 0 ? queryString : undefined,
              body: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
              contentType: request.headers['content-type']
            })
          : await client.invoke({ method: 'GET', queryString });

      reply.status(result.status ?? 200);
      for (const [headerName, value] of result.headers) {
        if (!DROPPED_HEADERS.has(headerName)) {
          reply.header(headerName, value);
        }
      }
      return reply.send(result.content);
    }
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (isGatewayError(error)) {
      reply.status(error.status).send({ error: error.code, message: error.message });
      return;
    }

    if (isCgiError(error)) {
      logger.warn({
        level: 'warn',
        message: 'CGI target failed',
        metadata: { url: request.url, classification: error.classification, exitCode: error.exitCode }
      });
      reply.status(cgiErrorStatus(error)).send({
        error: error.classification,
        message: error.message,
        exitCode: error.exitCode
      });
      return;
    }

    logger.error({
      level: 'error',
      message: 'Unhandled gateway error',
      metadata: { error: error instanceof Error ? error.message : String(error) }
    });

    reply.status(500).send({ error: 'INTERNAL_ERROR', message: 'Internal Error' });
  });

  return {
    async start() {
      await fastify.listen({ host: config.gateway.host, port: config.gateway.port });
    },
    async stop() {
      await fastify.close();
    },
    instance: fastify
  };
}

function enforceLoopback(request: FastifyRequest): void {
  const ip = request.ip;
  if (ip === '127.0.0.1' || ip === '::1' || ip === '::ffff:127.0.0.1') {
    return;
  }

  throw forbidden('Loopback access only');
}

function extractQueryString(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? '' : url.slice(index + 1);
}

function cgiErrorStatus(error: CgiError): number {
  return error.classification === 'CONFIG' ? 500 : 502;
}
