import { z } from 'zod';
import { BaseDataContainer, assertRowCounts } from './base';
import { InvalidArgumentError, MalformedMetadataError } from '../errors';
import type { Payload } from '../types';

export const TENSOR_CONTAINER_TAG = 'NdarrayContainer';

const BYTES_PER_ELEMENT = Float32Array.BYTES_PER_ELEMENT;

/** Dense row-major float32 tensor. */
export interface Tensor {
  readonly shape: readonly number[];
  readonly data: Float32Array;
}

const tensorMetaSchema = z.object({
  dtype: z.literal('float32'),
  shape: z.array(z.number().int().nonnegative()),
});

function product(dims: readonly number[]): number {
  return dims.reduce((acc, dim) => acc * dim, 1);
}

export function tensor(shape: readonly number[], values: ArrayLike<number>): Tensor {
  if (shape.some((dim) => !Number.isInteger(dim) || dim < 0)) {
    throw new InvalidArgumentError(`invalid tensor shape: [${shape.join(', ')}]`, { shape });
  }
  if (product(shape) !== values.length) {
    throw new InvalidArgumentError(`shape [${shape.join(', ')}] does not fit ${values.length} values`, {
      shape,
      length: values.length,
    });
  }
  return { shape: [...shape], data: Float32Array.from(values) };
}

/**
 * Float32 tensors, serialized as their raw element bytes with `shape` and
 * `dtype` in the payload meta. Batches concatenate along any axis.
 */
export class TensorContainer extends BaseDataContainer<Tensor> {
  readonly tag = TENSOR_CONTAINER_TAG;

  canHandle(value: unknown): value is Tensor {
    return (
      typeof value === 'object' &&
      value !== null &&
      'data' in value &&
      value.data instanceof Float32Array &&
      'shape' in value &&
      Array.isArray(value.shape)
    );
  }

  toPayload(batch: Tensor, batchDim: number): Payload {
    return {
      data: Buffer.from(batch.data.buffer, batch.data.byteOffset, batch.data.byteLength),
      meta: { dtype: 'float32', shape: [...batch.shape], batch_dim: batchDim },
      container: this.tag,
    };
  }

  fromPayload(payload: Payload): Tensor {
    this.assertTag(payload);
    const parsed = tensorMetaSchema.safeParse(payload.meta);
    if (!parsed.success) {
      throw new MalformedMetadataError('tensor payload meta must carry dtype "float32" and a shape', {
        issues: parsed.error.flatten(),
      });
    }
    const { shape } = parsed.data;
    const expected = product(shape) * BYTES_PER_ELEMENT;
    if (payload.data.byteLength !== expected) {
      throw new MalformedMetadataError(
        `tensor payload holds ${payload.data.byteLength} bytes, shape [${shape.join(', ')}] needs ${expected}`,
        { shape, byteLength: payload.data.byteLength },
      );
    }
    // copy so the element view is aligned and detached from the wire buffer
    const bytes = new Uint8Array(payload.data);
    return { shape, data: new Float32Array(bytes.buffer) };
  }

  batchesToBatch(batches: readonly Tensor[], batchDim: number): [Tensor, number[]] {
    const first = batches[0];
    if (!first) throw new InvalidArgumentError('cannot batch an empty list of tensors');
    assertAxis(first.shape, batchDim);

    for (const part of batches) {
      const compatible =
        part.shape.length === first.shape.length &&
        part.shape.every((dim, axis) => axis === batchDim || dim === first.shape[axis]);
      if (!compatible) {
        throw new InvalidArgumentError(
          `cannot concatenate shape [${part.shape.join(', ')}] with [${first.shape.join(', ')}] along axis ${batchDim}`,
          { batchDim },
        );
      }
    }

    const indices = batches.map((part) => part.shape[batchDim]);
    const shape = [...first.shape];
    shape[batchDim] = indices.reduce((acc, rows) => acc + rows, 0);

    const outer = product(first.shape.slice(0, batchDim));
    const inner = product(first.shape.slice(batchDim + 1));
    const data = new Float32Array(product(shape));
    let offset = 0;
    for (let o = 0; o < outer; o += 1) {
      for (const part of batches) {
        const span = part.shape[batchDim] * inner;
        data.set(part.data.subarray(o * span, (o + 1) * span), offset);
        offset += span;
      }
    }
    return [{ shape, data }, indices];
  }

  batchToBatches(batch: Tensor, indices: readonly number[], batchDim: number): Tensor[] {
    assertAxis(batch.shape, batchDim);
    const total = batch.shape[batchDim];
    assertRowCounts(indices, total);

    const outer = product(batch.shape.slice(0, batchDim));
    const inner = product(batch.shape.slice(batchDim + 1));
    const parts: Tensor[] = [];
    let start = 0;
    for (const rows of indices) {
      const shape = [...batch.shape];
      shape[batchDim] = rows;
      const span = rows * inner;
      const data = new Float32Array(outer * span);
      for (let o = 0; o < outer; o += 1) {
        const from = (o * total + start) * inner;
        data.set(batch.data.subarray(from, from + span), o * span);
      }
      parts.push({ shape, data });
      start += rows;
    }
    return parts;
  }
}

function assertAxis(shape: readonly number[], batchDim: number): void {
  if (!Number.isInteger(batchDim) || batchDim < 0 || batchDim >= shape.length) {
    throw new InvalidArgumentError(`batch dimension ${batchDim} is out of range for rank ${shape.length}`, {
      batchDim,
      rank: shape.length,
    });
  }
}
