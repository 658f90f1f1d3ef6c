export * from "./backoff";
export * from "./circuitBreaker";
export * from "./resilienceExecutor";
