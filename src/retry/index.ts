export { FiniteRetryStrategy, RetryStrategy, type RetryStrategyFactory } from './strategy.js';
