import fastify, { FastifyInstance } from 'fastify';
import { CompletionController } from '../../adapters/controllers/CompletionController';
import { SYMBOL_KINDS } from '../../domain/entities';

const documentProperties = {
  text: { type: 'string' },
  offset: { type: 'integer', minimum: 0 },
};

export function createServer(controller: CompletionController): FastifyInstance {
  const server = fastify();

  server.post(
    '/scan',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            root: { type: 'string', minLength: 1 },
          },
        },
      },
    },
    controller.scan.bind(controller),
  );

  server.post(
    '/complete',
    {
      schema: {
        body: {
          type: 'object',
          properties: documentProperties,
          required: ['text', 'offset'],
        },
      },
    },
    controller.complete.bind(controller),
  );

  server.post(
    '/classify',
    {
      schema: {
        body: {
          type: 'object',
          properties: documentProperties,
          required: ['text', 'offset'],
        },
      },
    },
    controller.classify.bind(controller),
  );

  server.post(
    '/apply',
    {
      schema: {
        body: {
          type: 'object',
          properties: {
            ...documentProperties,
            candidate: {
              type: 'object',
              properties: {
                kind: { type: 'string', enum: [...SYMBOL_KINDS] },
                text: { type: 'string', minLength: 1 },
              },
              required: ['kind', 'text'],
            },
          },
          required: ['text', 'offset', 'candidate'],
        },
      },
    },
    controller.apply.bind(controller),
  );

  server.get(
    '/symbols',
    {
      schema: {
        querystring: {
          type: 'object',
          properties: {
            name: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
          },
          required: ['name'],
        },
      },
    },
    controller.symbols.bind(controller),
  );

  server.get('/index', controller.snapshot.bind(controller));
  server.get('/health', async () => ({ status: 'ok' }));
  server.post('/shutdown', async () => {
    setTimeout(() => process.kill(process.pid, 'SIGTERM'), 200);
    return { status: 'shutting down' };
  });

  return server;
}
