export { withRateLimit } from "./withRateLimit";

export type { RateLimitOptions } from "./withRateLimit";
