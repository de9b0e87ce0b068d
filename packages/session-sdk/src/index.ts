/**
 * @stream-session/sdk
 *
 * Extension-point interfaces for the systems around the session core:
 * transport, tool runner, snapshot provider and tokenizer cache.
 *
 * Mock implementations for tests live under the `./testing` sub-path.
 */

export type {
  TransportUsage,
  UsageSink,
  StreamAttempt,
  StreamTransport,
  ToolInvocation,
  ToolRunner,
  SnapshotProvider,
  Tokenizer,
  TokenizerCache,
} from './collaborators.js';
