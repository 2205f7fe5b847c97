export { createServiceLogger, maskPII, type ServiceLogger } from './logger';
export {
  computeBackoffDelay,
  withExponentialBackoff,
  type BackoffPolicy,
  type RetryOptions,
} from './retry';
