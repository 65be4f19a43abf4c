import type { Params } from '../params/params';

/**
 * Receives decoded argument values. For batchable methods every argument
 * holds the rows of all merged calls along `batchDim`. May return a promise.
 */
export type RunnableHandler = (params: Params<unknown>) => unknown;

export interface RunnableMethod {
  handler: RunnableHandler;
  /** Whether concurrent calls may be merged into one handler invocation. */
  batchable: boolean;
  batchDim: number;
}

export type RunnableMethods = Record<string, RunnableMethod>;
