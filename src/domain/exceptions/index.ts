/**
 * spanline - Exception Module
 */

export {
  SpanlineException,
  ConfigurationException,
  SinkWriteException,
  SinkTimeoutException,
  toError,
} from './exceptions';

export type { SpanlineErrorCode } from './exceptions';
