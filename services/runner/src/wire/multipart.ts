import FormData from 'form-data';
import Dicer from 'dicer';
import contentDisposition from 'content-disposition';
import { parse as parseContentType } from 'content-type';
import { z } from 'zod';
import { Params } from '../params/params';
import { MalformedMetadataError, RunnerError } from '../errors';
import {
  PAYLOAD_META_HEADER,
  payloadContentType,
  payloadFromHeaders,
  serializePayloadMeta,
  type CodecOptions,
} from './headers';
import type { Payload, SlotAddress } from '../types';

const POSITIONAL_NAME = /^\d+$/;

const partHeadersSchema = z.record(z.array(z.string()));
const dispositionParamsSchema = z.object({ name: z.string().min(1) });

export interface EncodedMultipart {
  body: Buffer;
  /** Request headers for the body, including the multipart boundary. */
  headers: Record<string, string>;
}

/** Request as seen by the decoder: a header map and a buffered body. */
export interface InboundMessage {
  headers: Record<string, string | string[] | undefined>;
  body(): Promise<Buffer>;
}

interface RawPart {
  headers: Map<string, string>;
  body: Buffer;
}

/**
 * Encodes every slot as one `multipart/form-data` part named after its
 * percent-encoded slot address, carrying the payload meta and container tag in part headers.
 */
export function encodePayloadParams(params: Params<Payload>, options: CodecOptions = {}): EncodedMultipart {
  const form = new FormData();
  for (const [address, payload] of params.items()) {
    form.append(encodeSlotName(address), payload.data, {
      contentType: payloadContentType(payload.container, options.namespace),
      header: { [PAYLOAD_META_HEADER]: serializePayloadMeta(payload.meta) },
    });
  }
  return { body: form.getBuffer(), headers: form.getHeaders() };
}

/**
 * Rebuilds the params of a call from a multipart message. Parts named with
 * digits only are positional; all indices up to the highest one must be
 * present.
 */
export async function decodePayloadParams(
  message: InboundMessage,
  options: CodecOptions = {},
): Promise<Params<Payload>> {
  const boundary = multipartBoundary(headerValue(message.headers, 'content-type'));
  const parts = await parseMultipart(await message.body(), boundary);

  const entries = parts.map((part): [SlotAddress, Payload] => {
    const lookup = (name: string) => part.headers.get(name.toLowerCase());
    const name = decodeSlotName(partName(lookup('Content-Disposition')));
    const payload = payloadFromHeaders(lookup, part.body, options);
    return [POSITIONAL_NAME.test(name) ? Number(name) : name, payload];
  });

  return Params.fromMapping(entries, { contiguous: true });
}

// Part headers travel as latin1 and form-data rewrites quotes and line breaks
// in field names, so slot names cross the wire percent-encoded.
function encodeSlotName(address: SlotAddress): string {
  return encodeURIComponent(String(address));
}

function decodeSlotName(name: string): string {
  try {
    return decodeURIComponent(name);
  } catch {
    throw new MalformedMetadataError(`part name is not a valid percent-encoded slot name: ${name}`, { name });
  }
}

function headerValue(headers: InboundMessage['headers'], name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== name) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

function multipartBoundary(header: string | undefined): string {
  if (!header) throw new MalformedMetadataError('request is missing its content type');
  let parsed: ReturnType<typeof parseContentType>;
  try {
    parsed = parseContentType(header);
  } catch (err) {
    throw new MalformedMetadataError(`invalid content type: ${header}`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  const boundary = parsed.parameters.boundary;
  if (parsed.type !== 'multipart/form-data' || !boundary) {
    throw new MalformedMetadataError(`expected multipart/form-data with a boundary, got ${header}`);
  }
  return boundary;
}

function partName(disposition: string | undefined): string {
  if (!disposition) {
    throw new MalformedMetadataError('multipart part is missing its Content-Disposition header');
  }
  let parameters: unknown;
  try {
    parameters = contentDisposition.parse(disposition).parameters;
  } catch (err) {
    throw new MalformedMetadataError(`invalid Content-Disposition: ${disposition}`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = dispositionParamsSchema.safeParse(parameters);
  if (!parsed.success) {
    throw new MalformedMetadataError(`Content-Disposition does not name the part: ${disposition}`);
  }
  return parsed.data.name;
}

function parseMultipart(body: Buffer, boundary: string): Promise<RawPart[]> {
  return new Promise((resolve, reject) => {
    const parts: RawPart[] = [];
    let failed = false;

    const fail = (err: unknown) => {
      if (failed) return;
      failed = true;
      if (err instanceof RunnerError) {
        reject(err);
        return;
      }
      reject(
        new MalformedMetadataError(`malformed multipart body: ${err instanceof Error ? err.message : String(err)}`),
      );
    };

    const dicer = new Dicer({ boundary });
    dicer.on('part', (part) => {
      const headers = new Map<string, string>();
      const chunks: Buffer[] = [];

      part.on('header', (raw) => {
        const parsed = partHeadersSchema.safeParse(raw);
        if (!parsed.success) {
          fail(new MalformedMetadataError('unreadable multipart part headers'));
          return;
        }
        for (const [name, values] of Object.entries(parsed.data)) {
          if (values.length > 0) headers.set(name.toLowerCase(), values[0]);
        }
      });
      part.on('data', (chunk) => {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk);
      });
      part.on('end', () => {
        parts.push({ headers, body: Buffer.concat(chunks) });
      });
      part.on('error', fail);
    });
    dicer.on('error', fail);
    dicer.on('finish', () => {
      if (!failed) resolve(parts);
    });
    dicer.end(body);
  });
}
