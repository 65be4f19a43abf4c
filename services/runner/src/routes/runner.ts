import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { MalformedMetadataError, MethodNotFoundError, RunnerError } from '../errors';
import { executeBatch, executeCall } from '../runner/execute';
import { decodePayloadParams, type InboundMessage } from '../wire/multipart';
import { payloadResponseHeaders } from '../wire/headers';
import type { ContainerRegistry } from '../containers/registry';
import type { RunnableMethods } from '../contracts/runnable';

// ---------- Schemas ----------
const routeParamsSchema = z.object({
  method: z.string().min(1, 'method required'),
});

export interface RunnerRoutesOptions {
  methods: RunnableMethods;
  registry: ContainerRegistry;
  namespace?: string;
}

// ---------- Helper ----------
export function fromFastifyRequest(req: FastifyRequest): InboundMessage {
  return {
    headers: req.headers,
    body: async () => {
      if (!Buffer.isBuffer(req.body)) {
        throw new MalformedMetadataError('expected a multipart/form-data body');
      }
      return req.body;
    },
  };
}

// ---------- Routes ----------
export async function registerRunnerRoutes(app: FastifyInstance, options: RunnerRoutesOptions) {
  const methods = new Map(Object.entries(options.methods));
  const codec = { namespace: options.namespace };

  // Buffer the whole body; part framing happens in the wire codec.
  app.addContentTypeParser('multipart/form-data', { parseAs: 'buffer' }, (_req, body, done) => {
    done(null, body);
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof RunnerError) {
      if (err.status >= 500) {
        req.log.error({ err }, 'Runner call failed');
      } else {
        req.log.warn({ err: err.toJSON() }, 'Rejected runner call');
      }
      return reply.code(err.status).send({ error: err.type, detail: err.message });
    }

    const status = err.statusCode ?? 500;
    if (status >= 500) {
      req.log.error({ err }, 'Unhandled error in runner route');
      return reply.code(status).send({ error: 'internal_error', detail: err.message });
    }
    return reply.code(status).send({ error: err.code ?? 'bad_request', detail: err.message });
  });

  // Invoke a runnable method
  app.post('/:method', async (req, reply) => {
    const parsed = routeParamsSchema.safeParse(req.params);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const name = parsed.data.method;
    const method = methods.get(name);
    if (!method) throw new MethodNotFoundError(name);

    const params = await decodePayloadParams(fromFastifyRequest(req), codec);
    req.log.debug({ method: name, slots: params.slotAddresses() }, 'Decoded runner call');

    const result = method.batchable
      ? (await executeBatch(method, [params], options.registry))[0]
      : await executeCall(method, params, options.registry);

    return reply.code(200).headers(payloadResponseHeaders(result, codec)).send(result.data);
  });
}
