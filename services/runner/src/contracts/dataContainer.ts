import type { Payload } from '../types';

/**
 * Knows how to serialize one family of values to payloads and how to merge /
 * split those values along a batch dimension.
 */
export interface DataContainer<B> {
  /** Container tag written to `Payload.container`. */
  readonly tag: string;
  canHandle(value: unknown): value is B;
  toPayload(batch: B, batchDim: number): Payload;
  fromPayload(payload: Payload): B;
  batchesToBatch(batches: readonly B[], batchDim: number): [B, number[]];
  batchToBatches(batch: B, indices: readonly number[], batchDim: number): B[];
  fromBatchPayloads(payloads: readonly Payload[], batchDim: number): [Payload, number[]];
  batchToPayloads(batch: B, indices: readonly number[], batchDim: number): Payload[];
}
