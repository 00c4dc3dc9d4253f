export { SessionLoop, type SessionDriver, type SessionLoopOptions, type ClosedEvent, type FaultEvent } from './loop.js';
export {
  SessionRegistry,
  type InitializeRequest,
  type SessionHandle,
  type SessionRef,
  type SubscribeOptions,
  type RegistryOptions,
} from './registry.js';
export { SnapshotStream } from './stream.js';
