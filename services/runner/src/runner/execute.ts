import { aggregateToBatch, splitBatch } from '../batching/aggregate';
import { InvalidArgumentError } from '../errors';
import type { ContainerRegistry } from '../containers/registry';
import type { RunnableMethod } from '../contracts/runnable';
import type { Params } from '../params/params';
import type { Payload } from '../types';

/** Runs one call on its own: decode arguments, invoke, encode the result. */
export async function executeCall(
  method: RunnableMethod,
  params: Params<Payload>,
  registry: ContainerRegistry,
): Promise<Payload> {
  const values = params.map((payload) => registry.fromPayload(payload));
  const result = await method.handler(values);
  return registry.toPayload(result, method.batchDim);
}

/**
 * Runs several calls as one handler invocation and returns one result payload
 * per call, in call order.
 */
export async function executeBatch(
  method: RunnableMethod,
  calls: readonly Params<Payload>[],
  registry: ContainerRegistry,
): Promise<Payload[]> {
  if (!method.batchable) {
    throw new InvalidArgumentError('method is not batchable');
  }
  const { params, indices } = aggregateToBatch(calls, method.batchDim, registry);
  const batched = await executeCall(method, params, registry);
  return splitBatch(batched, indices, method.batchDim, registry);
}
