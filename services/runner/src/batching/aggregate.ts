import { Params } from '../params/params';
import { ArgumentMismatchError, EmptyParamsError, InvalidArgumentError } from '../errors';
import type { BatchAggregate, BatchingCapability } from '../contracts/batching';
import type { Payload } from '../types';

/**
 * Merges the arguments of several queued calls into one batched call.
 *
 * Each slot's payloads are handed to `capability.fromBatchPayloads`; every
 * slot must then report the same index list, since one batch boundary applies
 * to all arguments of the merged calls.
 */
export function aggregateToBatch<P = Payload>(
  paramsList: readonly Params<P>[],
  batchDim: number,
  capability: BatchingCapability<P>,
): BatchAggregate<P> {
  if (paramsList.length === 0) {
    throw new EmptyParamsError('cannot aggregate an empty list of calls');
  }

  const merged = Params.agg(paramsList, (payloads) => capability.fromBatchPayloads(payloads, batchDim));
  const params = merged.map(([batched]) => batched);
  const indexParams = merged.map(([, indices]) => indices);

  if (!indexParams.allEqual()) {
    throw new ArgumentMismatchError(
      `argument lengths for parameters do not match: ${JSON.stringify(indexParams.toJSON())}`,
      { indices: indexParams.toJSON() },
    );
  }

  return { params, indices: indexParams.sample };
}

/** Splits one batched result back into a payload per original call. */
export function splitBatch<P = Payload>(
  batch: P,
  indices: readonly number[],
  batchDim: number,
  capability: BatchingCapability<P>,
): P[] {
  const parts = capability.splitBatchPayload(batch, indices, batchDim);
  if (parts.length !== indices.length) {
    throw new InvalidArgumentError(`expected ${indices.length} payloads after splitting, got ${parts.length}`, {
      expected: indices.length,
      received: parts.length,
    });
  }
  return parts;
}
