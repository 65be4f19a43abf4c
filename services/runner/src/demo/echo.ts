/**
 * Demo runnables served by `main.ts`.
 *
 *  - `echo` (batchable): returns its first argument unchanged, so every merged
 *    call gets its own rows back after the split.
 *  - `describe` (not batchable): reports the slot layout it was called with.
 */
import type { RunnableMethods } from '../contracts/runnable';

export const demoMethods: RunnableMethods = {
  echo: {
    batchable: true,
    batchDim: 0,
    handler: (params) => params.sample,
  },
  describe: {
    batchable: false,
    batchDim: 0,
    handler: (params) => ({
      positional: params.args.length,
      named: Array.from(params.kwargs.keys()),
    }),
  },
};
