import { InvalidArgumentError, UnsupportedContainerError } from '../errors';
import type { DataContainer } from '../contracts/dataContainer';
import type { Payload } from '../types';

/**
 * Derives the payload-level batching operations from the value-level
 * primitives each container implements.
 */
export abstract class BaseDataContainer<B> implements DataContainer<B> {
  abstract readonly tag: string;

  abstract canHandle(value: unknown): value is B;
  abstract toPayload(batch: B, batchDim: number): Payload;
  abstract fromPayload(payload: Payload): B;
  abstract batchesToBatch(batches: readonly B[], batchDim: number): [B, number[]];
  abstract batchToBatches(batch: B, indices: readonly number[], batchDim: number): B[];

  fromBatchPayloads(payloads: readonly Payload[], batchDim: number): [Payload, number[]] {
    const batches = payloads.map((payload) => this.fromPayload(payload));
    const [batch, indices] = this.batchesToBatch(batches, batchDim);
    return [this.toPayload(batch, batchDim), indices];
  }

  batchToPayloads(batch: B, indices: readonly number[], batchDim: number): Payload[] {
    return this.batchToBatches(batch, indices, batchDim).map((part) => this.toPayload(part, batchDim));
  }

  protected assertTag(payload: Payload): void {
    if (payload.container !== this.tag) {
      throw new UnsupportedContainerError(`${this.tag} cannot decode a ${payload.container} payload`, {
        expected: this.tag,
        received: payload.container,
      });
    }
  }
}

/** Row counts must be non-negative integers that cover the batch exactly. */
export function assertRowCounts(indices: readonly number[], total: number): void {
  let sum = 0;
  for (const count of indices) {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidArgumentError(`invalid row count in index list: ${count}`, { indices });
    }
    sum += count;
  }
  if (sum !== total) {
    throw new InvalidArgumentError(`index list covers ${sum} rows but the batch has ${total}`, {
      indices,
      total,
    });
  }
}
