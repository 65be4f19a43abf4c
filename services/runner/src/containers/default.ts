import { BaseDataContainer, assertRowCounts } from './base';
import { InvalidArgumentError } from '../errors';
import { jsonValueSchema } from '../schemas';
import type { JsonValue, Payload } from '../types';

export const DEFAULT_CONTAINER_TAG = 'DefaultContainer';

/**
 * JSON values. Batches are lists; batching concatenates them and only
 * supports batch dimension 0.
 */
export class DefaultContainer extends BaseDataContainer<JsonValue> {
  readonly tag = DEFAULT_CONTAINER_TAG;

  canHandle(value: unknown): value is JsonValue {
    return jsonValueSchema.safeParse(value).success;
  }

  toPayload(batch: JsonValue, batchDim: number): Payload {
    return {
      data: Buffer.from(JSON.stringify(batch), 'utf8'),
      meta: { format: 'json', batch_dim: batchDim },
      container: this.tag,
    };
  }

  fromPayload(payload: Payload): JsonValue {
    this.assertTag(payload);
    let decoded: unknown;
    try {
      decoded = JSON.parse(payload.data.toString('utf8'));
    } catch (err) {
      throw new InvalidArgumentError('DefaultContainer payload is not valid JSON', {
        reason: err instanceof Error ? err.message : String(err),
      });
    }
    const parsed = jsonValueSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new InvalidArgumentError('DefaultContainer payload holds a value JSON cannot represent', {
        issues: parsed.error.flatten(),
      });
    }
    return parsed.data;
  }

  batchesToBatch(batches: readonly JsonValue[], batchDim: number): [JsonValue, number[]] {
    assertFirstDim(batchDim);
    const batch: JsonValue[] = [];
    const indices: number[] = [];
    for (const part of batches) {
      const rows = asList(part);
      batch.push(...rows);
      indices.push(rows.length);
    }
    return [batch, indices];
  }

  batchToBatches(batch: JsonValue, indices: readonly number[], batchDim: number): JsonValue[] {
    assertFirstDim(batchDim);
    const rows = asList(batch);
    assertRowCounts(indices, rows.length);

    const parts: JsonValue[] = [];
    let offset = 0;
    for (const count of indices) {
      parts.push(rows.slice(offset, offset + count));
      offset += count;
    }
    return parts;
  }
}

function assertFirstDim(batchDim: number): void {
  if (batchDim !== 0) {
    throw new InvalidArgumentError(`DefaultContainer only batches along dimension 0, got ${batchDim}`, {
      batchDim,
    });
  }
}

function asList(value: JsonValue): JsonValue[] {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError('DefaultContainer batches must be lists');
  }
  return value;
}
