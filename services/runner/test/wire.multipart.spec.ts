import FormData from 'form-data';
import { describe, expect, it } from 'vitest';
import { Params } from '../src/params/params';
import { decodePayloadParams, encodePayloadParams, type InboundMessage } from '../src/wire/multipart';
import {
  PAYLOAD_META_HEADER,
  parseContainerTag,
  payloadFromHeaders,
  payloadResponseHeaders,
  serializePayloadMeta,
} from '../src/wire/headers';
import { MalformedMetadataError, MissingSlotError } from '../src/errors';
import type { Payload } from '../src/types';

type RawPart = { name: string; body?: string; contentType?: string; meta?: string };

function messageFrom(body: Buffer, headers: Record<string, string>): InboundMessage {
  return { headers, body: async () => body };
}

function rawMessage(parts: RawPart[]): InboundMessage {
  const form = new FormData();
  for (const part of parts) {
    form.append(part.name, Buffer.from(part.body ?? part.name), {
      contentType: part.contentType ?? 'application/vnd.slotbatch.DefaultContainer',
      header: { [PAYLOAD_META_HEADER]: part.meta ?? '{}' },
    });
  }
  return messageFrom(form.getBuffer(), form.getHeaders());
}

function payload(body: string, container: string, meta: Payload['meta'] = {}): Payload {
  return { data: Buffer.from(body), meta, container };
}

describe('encodePayloadParams', () => {
  it('emits one part per slot with metadata, content type and slot name', () => {
    const params = new Params([payload('[1]', 'DefaultContainer', { k: 1 })], {
      foo: payload('bar', 'NdarrayContainer'),
    });

    const { body, headers } = encodePayloadParams(params);
    const text = body.toString('latin1');

    expect(headers['content-type']).toMatch(/^multipart\/form-data; boundary=/);
    expect(text).toContain('Content-Disposition: form-data; name="0"\r\n');
    expect(text).toContain('Content-Type: application/vnd.slotbatch.DefaultContainer\r\n');
    expect(text).toContain(`${PAYLOAD_META_HEADER}: {"k":1}\r\n`);
    expect(text).toContain('Content-Disposition: form-data; name="foo"\r\n');
    expect(text).toContain('Content-Type: application/vnd.slotbatch.NdarrayContainer\r\n');
  });
});

describe('decodePayloadParams', () => {
  it('round-trips slot addressing, data, meta and container tags', async () => {
    const params = new Params(
      [payload('[1,2]', 'DefaultContainer', { format: 'json' }), payload('\u0000\u0001binary', 'NdarrayContainer')],
      { foo: payload('named', 'DefaultContainer', { label: 'café', nested: { n: [1, null] } }) },
    );
    const { body, headers } = encodePayloadParams(params);

    const decoded = await decodePayloadParams(messageFrom(body, headers));

    expect(decoded.slotAddresses()).toEqual([0, 1, 'foo']);
    for (const [address, original] of params.items()) {
      const restored = decoded.get(address);
      expect(restored.data.equals(original.data)).toBe(true);
      expect(restored.meta).toEqual(original.meta);
      expect(restored.container).toBe(original.container);
    }
  });

  it('round-trips named slots with non-ASCII characters, quotes and percent signs', async () => {
    const keys = ['naïve', 'a"b', 'line\r\nbreak', '100%', 'a%22b'];
    const params = new Params([], Object.fromEntries(keys.map((key) => [key, payload(key, 'DefaultContainer')])));
    const { body, headers } = encodePayloadParams(params);

    const decoded = await decodePayloadParams(messageFrom(body, headers));

    expect(Array.from(decoded.kwargs.keys())).toEqual(keys);
    expect(decoded.get('naïve').data.toString('utf8')).toBe('naïve');
  });

  it('fails on part names that are not valid percent-encoding', async () => {
    await expect(decodePayloadParams(rawMessage([{ name: 'bad%zz' }]))).rejects.toBeInstanceOf(
      MalformedMetadataError,
    );
  });

  it('orders positional parts by index and keeps other parts named', async () => {
    const decoded = await decodePayloadParams(rawMessage([{ name: 'foo' }, { name: '1' }, { name: '0' }]));

    expect(decoded.args.map((p) => p.data.toString())).toEqual(['0', '1']);
    expect(Array.from(decoded.kwargs.keys())).toEqual(['foo']);
    expect(decoded.get('foo').container).toBe('DefaultContainer');
  });

  it('fails when a positional index is missing', async () => {
    await expect(decodePayloadParams(rawMessage([{ name: '0' }, { name: '2' }]))).rejects.toBeInstanceOf(
      MissingSlotError,
    );
  });

  it('fails on metadata that is not JSON', async () => {
    await expect(decodePayloadParams(rawMessage([{ name: '0', meta: '{oops' }]))).rejects.toBeInstanceOf(
      MalformedMetadataError,
    );
  });

  it('fails on a content type outside the payload namespace', async () => {
    const message = rawMessage([{ name: '0', contentType: 'application/octet-stream' }]);
    await expect(decodePayloadParams(message)).rejects.toBeInstanceOf(MalformedMetadataError);
  });

  it('fails on a request that is not multipart', async () => {
    const message = messageFrom(Buffer.from('{}'), { 'content-type': 'application/json' });
    await expect(decodePayloadParams(message)).rejects.toBeInstanceOf(MalformedMetadataError);
  });

  it('honours a custom namespace on both sides', async () => {
    const params = new Params([payload('[]', 'DefaultContainer')]);
    const { body, headers } = encodePayloadParams(params, { namespace: 'acme' });

    const decoded = await decodePayloadParams(messageFrom(body, headers), { namespace: 'acme' });
    expect(decoded.get(0).container).toBe('DefaultContainer');

    await expect(decodePayloadParams(messageFrom(body, headers))).rejects.toBeInstanceOf(MalformedMetadataError);
  });

  it('decodes an empty message into an empty container', async () => {
    const { body, headers } = encodePayloadParams(new Params<Payload>());
    const decoded = await decodePayloadParams(messageFrom(body, headers));
    expect(decoded.size).toBe(0);
  });
});

describe('payload headers', () => {
  it('extracts the container tag after the vendor prefix', () => {
    expect(parseContainerTag('application/vnd.slotbatch.NdarrayContainer')).toBe('NdarrayContainer');
    expect(parseContainerTag('application/vnd.slotbatch.NdarrayContainer; charset=binary')).toBe('NdarrayContainer');
    expect(parseContainerTag('application/vnd.acme.Stub', 'acme')).toBe('Stub');
  });

  it('rejects missing or empty container tags', () => {
    expect(() => parseContainerTag(undefined)).toThrow(MalformedMetadataError);
    expect(() => parseContainerTag('application/vnd.slotbatch.')).toThrow(MalformedMetadataError);
  });

  it('escapes non-ASCII characters in the meta header', () => {
    expect(serializePayloadMeta({ label: 'café' })).toBe('{"label":"caf\\u00e9"}');
  });

  it('round-trips a single payload through response headers', () => {
    const original = payload('[3]', 'DefaultContainer', { rows: 1 });
    const headers = new Map(
      Object.entries(payloadResponseHeaders(original)).map(([name, value]) => [name.toLowerCase(), value]),
    );

    const restored = payloadFromHeaders((name) => headers.get(name.toLowerCase()), original.data);

    expect(restored).toEqual(original);
  });
});
