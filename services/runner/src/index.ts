export * from './types';
export * from './errors';
export { Params } from './params/params';
export type { AggregateFn, Equality, FromMappingOptions, IterOptions } from './params/params';
export { aggregateToBatch, splitBatch } from './batching/aggregate';
export type { BatchAggregate, BatchingCapability } from './contracts/batching';
export type { DataContainer } from './contracts/dataContainer';
export type { RunnableHandler, RunnableMethod, RunnableMethods } from './contracts/runnable';
export { BaseDataContainer } from './containers/base';
export { DefaultContainer, DEFAULT_CONTAINER_TAG } from './containers/default';
export { TensorContainer, TENSOR_CONTAINER_TAG, tensor } from './containers/tensor';
export type { Tensor } from './containers/tensor';
export { ContainerRegistry } from './containers/registry';
export {
  DEFAULT_NAMESPACE,
  PAYLOAD_META_HEADER,
  parseContainerTag,
  parsePayloadMeta,
  payloadContentType,
  payloadFromHeaders,
  payloadResponseHeaders,
  serializePayloadMeta,
} from './wire/headers';
export type { CodecOptions, HeaderLookup } from './wire/headers';
export { decodePayloadParams, encodePayloadParams } from './wire/multipart';
export type { EncodedMultipart, InboundMessage } from './wire/multipart';
export { executeBatch, executeCall } from './runner/execute';
export { buildApp } from './server';
export type { BuildAppOptions } from './server';
export { createRunnerClient } from './sdk/runnerClient';
export type { RunnerClient, RunnerClientOptions } from './sdk/runnerClient';
