export { RateLimitExceededException } from './rate-limit-exceeded.exception';
