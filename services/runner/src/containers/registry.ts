import { DefaultContainer } from './default';
import { TensorContainer } from './tensor';
import { InvalidArgumentError, UnsupportedContainerError } from '../errors';
import type { BatchingCapability } from '../contracts/batching';
import type { DataContainer } from '../contracts/dataContainer';
import type { Payload } from '../types';

/**
 * Resolves data containers by payload tag (decoding, batching) or by value
 * (encoding). Containers are consulted in registration order.
 */
export class ContainerRegistry implements BatchingCapability<Payload> {
  private readonly containers = new Map<string, DataContainer<unknown>>();

  constructor(containers: readonly DataContainer<unknown>[] = [new TensorContainer(), new DefaultContainer()]) {
    containers.forEach((container) => this.register(container));
  }

  register(container: DataContainer<unknown>): this {
    this.containers.set(container.tag, container);
    return this;
  }

  tags(): string[] {
    return Array.from(this.containers.keys());
  }

  forTag(tag: string): DataContainer<unknown> {
    const container = this.containers.get(tag);
    if (!container) {
      throw new UnsupportedContainerError(`no data container registered for tag: ${tag}`, { container: tag });
    }
    return container;
  }

  forValue(value: unknown): DataContainer<unknown> {
    for (const container of this.containers.values()) {
      if (container.canHandle(value)) return container;
    }
    throw new UnsupportedContainerError(`no data container can encode a value of type ${describe(value)}`, {
      type: describe(value),
    });
  }

  toPayload(value: unknown, batchDim: number): Payload {
    return this.forValue(value).toPayload(value, batchDim);
  }

  fromPayload(payload: Payload): unknown {
    return this.forTag(payload.container).fromPayload(payload);
  }

  fromBatchPayloads(payloads: readonly Payload[], batchDim: number): [Payload, number[]] {
    const first = payloads[0];
    if (!first) throw new InvalidArgumentError('cannot batch an empty list of payloads');
    const mixed = payloads.find((payload) => payload.container !== first.container);
    if (mixed) {
      throw new InvalidArgumentError(
        `payloads of one slot must share a container, got ${first.container} and ${mixed.container}`,
        { containers: payloads.map((payload) => payload.container) },
      );
    }
    return this.forTag(first.container).fromBatchPayloads(payloads, batchDim);
  }

  splitBatchPayload(batch: Payload, indices: readonly number[], batchDim: number): Payload[] {
    const container = this.forTag(batch.container);
    return container.batchToPayloads(container.fromPayload(batch), indices, batchDim);
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
