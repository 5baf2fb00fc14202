export { type HeaderCallback, RateLimiter, type RateLimiterDefinition } from './limiter.js';
