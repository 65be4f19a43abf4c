import { MalformedMetadataError } from '../errors';
import { payloadMetaSchema } from '../schemas';
import type { Payload, PayloadMeta } from '../types';

export const PAYLOAD_META_HEADER = 'Slotbatch-Payload-Meta';
export const DEFAULT_NAMESPACE = 'slotbatch';

export interface CodecOptions {
  /** Vendor namespace in `application/vnd.<namespace>.<container>`. */
  namespace?: string;
}

/** Case-insensitive header lookup. */
export type HeaderLookup = (name: string) => string | undefined;

function vendorPrefix(namespace: string): string {
  return `application/vnd.${namespace}.`;
}

export function payloadContentType(container: string, namespace = DEFAULT_NAMESPACE): string {
  return `${vendorPrefix(namespace)}${container}`;
}

export function parseContainerTag(contentType: string | undefined, namespace = DEFAULT_NAMESPACE): string {
  if (!contentType) {
    throw new MalformedMetadataError('payload is missing its content type');
  }
  // parameters such as charset are not part of the tag
  const mediaType = contentType.split(';', 1)[0].trim();
  const prefix = vendorPrefix(namespace);
  if (!mediaType.toLowerCase().startsWith(prefix.toLowerCase()) || mediaType.length === prefix.length) {
    throw new MalformedMetadataError(`content type ${JSON.stringify(contentType)} does not name a ${namespace} container`, {
      contentType,
    });
  }
  return mediaType.slice(prefix.length);
}

/**
 * JSON for the meta header. Code points above 0x7e are escaped since
 * multipart header blocks are framed as latin1.
 */
export function serializePayloadMeta(meta: PayloadMeta): string {
  return JSON.stringify(meta).replace(
    /[\u007f-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}

export function parsePayloadMeta(raw: string | undefined): PayloadMeta {
  if (raw === undefined) {
    throw new MalformedMetadataError(`payload is missing the ${PAYLOAD_META_HEADER} header`);
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new MalformedMetadataError(`${PAYLOAD_META_HEADER} is not valid JSON`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = payloadMetaSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedMetadataError(`${PAYLOAD_META_HEADER} must be a JSON object`, {
      issues: parsed.error.flatten(),
    });
  }
  return parsed.data;
}

/** Headers that carry a single payload as an HTTP response. */
export function payloadResponseHeaders(payload: Payload, options: CodecOptions = {}): Record<string, string> {
  return {
    [PAYLOAD_META_HEADER]: serializePayloadMeta(payload.meta),
    'Content-Type': payloadContentType(payload.container, options.namespace),
  };
}

export function payloadFromHeaders(lookup: HeaderLookup, data: Buffer, options: CodecOptions = {}): Payload {
  return {
    data,
    meta: parsePayloadMeta(lookup(PAYLOAD_META_HEADER)),
    container: parseContainerTag(lookup('Content-Type'), options.namespace),
  };
}
