import { isDeepStrictEqual } from 'util';
import {
  EmptyParamsError,
  InvalidArgumentError,
  MissingSlotError,
  SlotLengthMismatchError,
  SlotMismatchError,
} from '../errors';
import type { SlotAddress } from '../types';

const POSITIONAL_NAME = /^\d+$/;

export interface FromMappingOptions {
  /** Reject gaps in the positional range `0..max` instead of compacting them. */
  contiguous?: boolean;
}

export interface IterOptions {
  /** Throw when slot sequences end at different lengths instead of truncating. */
  strict?: boolean;
}

export type Equality<T> = (a: T, b: T) => boolean;

export type AggregateFn<T, U> = (values: T[], address: SlotAddress) => U;

function isReadonlyMap<V>(value: Record<string, V> | ReadonlyMap<string, V>): value is ReadonlyMap<string, V> {
  return value instanceof Map;
}

/**
 * Container for the positional and named arguments of a call. Lets an
 * operation run over every argument value at once while keeping each value's
 * slot (index or key) intact.
 *
 * The same type holds a single call's arguments (`Params<Payload>`) and
 * per-slot data derived from many calls (`Params<number[]>`, `Params<Payload[]>`).
 */
export class Params<T> {
  readonly args: readonly T[];
  readonly kwargs: ReadonlyMap<string, T>;

  constructor(args: Iterable<T> = [], kwargs: Record<string, T> | ReadonlyMap<string, T> = {}) {
    this.args = Object.freeze(Array.from(args));
    const named = new Map<string, T>(isReadonlyMap(kwargs) ? kwargs : Object.entries(kwargs));
    for (const key of named.keys()) {
      if (POSITIONAL_NAME.test(key)) {
        throw new InvalidArgumentError(
          `named slot "${key}" collides with positional addressing; use a numeric index instead`,
          { key },
        );
      }
    }
    this.kwargs = named;
  }

  /**
   * Builds params from `(address, value)` entries. Integer keys become
   * positional slots ordered by key, string keys become named slots.
   */
  static fromMapping<T>(
    data: Iterable<readonly [SlotAddress, T]>,
    options: FromMappingOptions = {},
  ): Params<T> {
    const positional = new Map<number, T>();
    const named = new Map<string, T>();

    for (const [key, value] of data) {
      if (typeof key === 'string') {
        named.set(key, value);
        continue;
      }
      if (!Number.isInteger(key) || key < 0) {
        throw new InvalidArgumentError(`positional slot index must be a non-negative integer, got ${key}`, {
          key,
        });
      }
      positional.set(key, value);
    }

    const ordered = Array.from(positional).sort(([a], [b]) => a - b);
    if (options.contiguous) {
      const maxIndex = ordered.at(-1)?.[0] ?? -1;
      ordered.forEach(([index], position) => {
        if (index !== position) throw new MissingSlotError(position, maxIndex);
      });
    }

    return new Params(
      ordered.map(([, value]) => value),
      named,
    );
  }

  /**
   * Aggregates many params into one by applying `aggFn` to the values found at
   * the same slot of every input, in input order.
   */
  static agg<T>(paramsList: readonly Params<T>[]): Params<T[]>;
  static agg<T, U>(paramsList: readonly Params<T>[], aggFn: AggregateFn<T, U>): Params<U>;
  static agg<T, U>(paramsList: readonly Params<T>[], aggFn?: AggregateFn<T, U>): Params<U | T[]> {
    const first = paramsList[0];
    if (!first) return new Params<U | T[]>();

    paramsList.forEach((params, position) => {
      if (!first.hasSameSlots(params)) {
        throw new SlotMismatchError(
          `params at position ${position} do not share slot addressing with the first params`,
          { expected: first.slotAddresses(), received: params.slotAddresses() },
        );
      }
    });

    const combine: AggregateFn<T, U | T[]> = aggFn ?? ((values) => values);
    const args = first.args.map((_, index) =>
      combine(
        paramsList.map((params) => params.get(index)),
        index,
      ),
    );
    const kwargs = new Map<string, U | T[]>();
    for (const key of first.kwargs.keys()) {
      kwargs.set(
        key,
        combine(
          paramsList.map((params) => params.get(key)),
          key,
        ),
      );
    }
    return new Params(args, kwargs);
  }

  get size(): number {
    return this.args.length + this.kwargs.size;
  }

  /**
   * First positional value, or the first named value when there are no
   * positional slots.
   */
  get sample(): T {
    if (this.args.length > 0) return this.args[0];
    const first = this.kwargs.values().next();
    if (first.done) throw new EmptyParamsError('cannot sample a params container without slots');
    return first.value;
  }

  /** Positional slots in index order, then named slots in insertion order. */
  *items(): Generator<[SlotAddress, T]> {
    yield* this.args.entries();
    yield* this.kwargs.entries();
  }

  slotAddresses(): SlotAddress[] {
    return Array.from(this.items(), ([address]) => address);
  }

  get(address: SlotAddress): T {
    if (typeof address === 'number') {
      if (address >= 0 && address < this.args.length) return this.args[address];
    } else {
      const value = this.kwargs.get(address);
      if (value !== undefined) return value;
      // an undefined value is still a slot; only scan when the key is present
      if (this.kwargs.has(address)) {
        for (const [key, stored] of this.kwargs) {
          if (key === address) return stored;
        }
      }
    }
    throw new InvalidArgumentError(`no slot at address ${JSON.stringify(address)}`, { address });
  }

  hasSameSlots(other: Params<unknown>): boolean {
    if (other.args.length !== this.args.length || other.kwargs.size !== this.kwargs.size) {
      return false;
    }
    for (const key of this.kwargs.keys()) {
      if (!other.kwargs.has(key)) return false;
    }
    return true;
  }

  allEqual(equals: Equality<T> = isDeepStrictEqual): boolean {
    const entries = this.items();
    const first = entries.next();
    if (first.done) throw new EmptyParamsError('allEqual() requires at least one slot');
    const [, expected] = first.value;
    for (const [, value] of entries) {
      if (!equals(value, expected)) return false;
    }
    return true;
  }

  map<U>(fn: (value: T, address: SlotAddress) => U): Params<U> {
    const kwargs = new Map<string, U>();
    for (const [key, value] of this.kwargs) {
      kwargs.set(key, fn(value, key));
    }
    return new Params(
      this.args.map((value, index) => fn(value, index)),
      kwargs,
    );
  }

  /**
   * Walks every slot's sequence in lock-step, yielding params that hold the
   * i-th element of each slot. Stops when the shortest slot runs out.
   */
  *iter<U>(this: Params<Iterable<U>>, options: IterOptions = {}): Generator<Params<U>> {
    if (this.size === 0) return;
    const iterators = this.map((value) => value[Symbol.iterator]());

    for (let step = 0; ; step += 1) {
      let exhausted = 0;
      const args: U[] = [];
      const kwargs = new Map<string, U>();

      for (const iterator of iterators.args) {
        const next = iterator.next();
        if (next.done) exhausted += 1;
        else args.push(next.value);
      }
      for (const [key, iterator] of iterators.kwargs) {
        const next = iterator.next();
        if (next.done) exhausted += 1;
        else kwargs.set(key, next.value);
      }

      if (exhausted === this.size) return;
      if (exhausted > 0) {
        if (options.strict) {
          throw new SlotLengthMismatchError(
            `slot sequences have different lengths: ${exhausted} of ${this.size} ended after ${step} items`,
            { step, exhausted },
          );
        }
        return;
      }
      yield new Params(args, kwargs);
    }
  }

  toJSON(): Record<string, T> {
    return Object.fromEntries(Array.from(this.items(), ([address, value]) => [String(address), value]));
  }
}
