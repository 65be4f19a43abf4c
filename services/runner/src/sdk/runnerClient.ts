import { ContainerRegistry } from '../containers/registry';
import { RunnerRequestError } from '../errors';
import { encodePayloadParams } from '../wire/multipart';
import { payloadFromHeaders } from '../wire/headers';
import type { Params } from '../params/params';
import type { Payload } from '../types';

const DEFAULT_BASE_URL = 'http://localhost:3000';

type FetchImpl = typeof fetch;

export interface RunnerClientOptions {
  baseUrl?: string;
  namespace?: string;
  registry?: ContainerRegistry;
  fetch?: FetchImpl;
}

export interface RunnerClient {
  /** Sends already-serialized arguments and returns the raw result payload. */
  call(method: string, params: Params<Payload>): Promise<Payload>;
  /** Serializes values through the registry and decodes the result. */
  callValues(method: string, params: Params<unknown>, batchDim?: number): Promise<unknown>;
}

export function createRunnerClient(options: RunnerClientOptions = {}): RunnerClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const registry = options.registry ?? new ContainerRegistry();
  const codec = { namespace: options.namespace };

  const fetchImpl: FetchImpl | undefined = options.fetch ?? globalThis.fetch;
  if (!fetchImpl) {
    throw new Error('createRunnerClient: fetch implementation required (pass options.fetch).');
  }
  const boundFetch: FetchImpl = fetchImpl.bind(globalThis);

  async function call(method: string, params: Params<Payload>): Promise<Payload> {
    const { body, headers } = encodePayloadParams(params, codec);
    const res = await boundFetch(`${baseUrl}/${encodeURIComponent(method)}`, {
      method: 'POST',
      headers,
      body,
    });

    if (!res.ok) {
      const detail = await safeReadBody(res);
      throw new RunnerRequestError(res.status, `${method} failed: ${res.status} ${res.statusText}${detail}`, {
        method,
      });
    }

    const data = Buffer.from(await res.arrayBuffer());
    return payloadFromHeaders((name) => res.headers.get(name) ?? undefined, data, codec);
  }

  async function callValues(method: string, params: Params<unknown>, batchDim = 0): Promise<unknown> {
    const payloads = params.map((value) => registry.toPayload(value, batchDim));
    const result = await call(method, payloads);
    return registry.fromPayload(result);
  }

  return { call, callValues };
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
