/**
 * Peer binding and the receive pipeline
 */

export type {
  FrameDecoder,
  ReceivePipelineOptions,
  ReceivePipelineEvents,
  ReceivePipelineStats,
} from './receive-pipeline.js';
export { ReceivePipeline } from './receive-pipeline.js';

export type {
  BinderRole,
  SessionBinderConfig,
  SenderBinderConfig,
  ReceiverBinderConfig,
  PeerBinding,
  SessionBinderEvents,
} from './binder.js';
export { SessionBinder } from './binder.js';
