import type { Params } from '../params/params';
import type { Payload } from '../types';

/**
 * Merges the values one slot received from several calls into a single value
 * along `batchDim`, and splits a batched value back.
 *
 * `indices[i]` is the number of batch-dimension rows contributed by the i-th
 * input, in input order.
 */
export interface BatchingCapability<P = Payload> {
  fromBatchPayloads(payloads: readonly P[], batchDim: number): [P, number[]];
  splitBatchPayload(batch: P, indices: readonly number[], batchDim: number): P[];
}

/** Batched arguments of one dispatch plus the per-call row counts. */
export interface BatchAggregate<P = Payload> {
  params: Params<P>;
  indices: number[];
}
