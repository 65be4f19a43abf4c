import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { buildApp } from '../src/server';
import { createRunnerClient } from '../src/sdk/runnerClient';
import { demoMethods } from '../src/demo/echo';
import { Params } from '../src/params/params';
import { RunnerRequestError } from '../src/errors';
import type { Payload } from '../src/types';

type AppInstance = Awaited<ReturnType<typeof buildApp>>;

function requestUrl(input: string | URL | Request): string {
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
}

// Routes client requests into the in-process app instead of the network.
function injectingFetch(app: AppInstance): typeof fetch {
  return async (input, init) => {
    const url = new URL(requestUrl(input));
    const body = init?.body;
    const res = await app.inject({
      method: 'POST',
      url: url.pathname,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      payload: Buffer.isBuffer(body) ? body : undefined,
    });

    const headers = new Headers();
    for (const [name, value] of Object.entries(res.headers)) {
      if (value === undefined) continue;
      headers.set(name, Array.isArray(value) ? value.join(', ') : String(value));
    }
    return new Response(res.rawPayload, { status: res.statusCode, statusText: res.statusMessage, headers });
  };
}

describe('createRunnerClient', () => {
  let app: AppInstance;

  beforeAll(async () => {
    app = await buildApp({ methods: demoMethods });
  });

  afterAll(async () => {
    await app.close();
  });

  it('round-trips values through a batchable method', async () => {
    const client = createRunnerClient({ baseUrl: 'http://runner.test', fetch: injectingFetch(app) });
    await expect(client.callValues('echo', new Params([[1, 2, 3]]))).resolves.toEqual([1, 2, 3]);
  });

  it('sends named arguments alongside positional ones', async () => {
    const client = createRunnerClient({ baseUrl: 'http://runner.test', fetch: injectingFetch(app) });
    const result = await client.callValues('describe', new Params<unknown>([['a']], { flag: true, label: 'x' }));
    expect(result).toEqual({ positional: 1, named: ['flag', 'label'] });
  });

  it('raises a request error carrying the runner status', async () => {
    const client = createRunnerClient({ baseUrl: 'http://runner.test', fetch: injectingFetch(app) });

    const failure = client.callValues('nope', new Params([[1]]));

    await expect(failure).rejects.toBeInstanceOf(RunnerRequestError);
    await expect(failure).rejects.toMatchObject({ status: 404, type: 'runner_request_failed' });
  });

  it('joins the base url and encoded method name', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response('{"ok":true}', {
          status: 200,
          headers: {
            'content-type': 'application/vnd.slotbatch.DefaultContainer',
            'slotbatch-payload-meta': '{"format":"json"}',
          },
        }),
    );
    const client = createRunnerClient({ baseUrl: 'http://runner.test/', fetch: fetchMock });

    const result: Payload = await client.call('models/v1', new Params<Payload>());

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://runner.test/models%2Fv1');
    expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: 'POST' });
    expect(result).toEqual({
      data: Buffer.from('{"ok":true}'),
      meta: { format: 'json' },
      container: 'DefaultContainer',
    });
  });
});
