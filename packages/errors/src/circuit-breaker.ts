import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Minimum number of requests in the window before the circuit can open. Default: 5 */
  volumeThreshold?: number;
}

export interface CircuitStateListener {
  warn(obj: Record<string, unknown>, msg: string): void;
}

const DEFAULT_OPTIONS: Required<
  Pick<
    CircuitBreakerOptions,
    "timeout" | "errorThresholdPercentage" | "resetTimeout" | "volumeThreshold"
  >
> = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
  listener?: CircuitStateListener,
): CircuitBreaker<TArgs, TResult> {
  const mergedOptions = { ...DEFAULT_OPTIONS, ...options, name };

  const breaker = new CircuitBreaker<TArgs, TResult>(fn, mergedOptions);

  if (listener) {
    breaker.on("open", () => {
      listener.warn({ breaker: name, state: "open" }, "circuit opened, calls short-circuited");
    });
    breaker.on("halfOpen", () => {
      listener.warn({ breaker: name, state: "halfOpen" }, "circuit half-open, next call is a probe");
    });
    breaker.on("close", () => {
      listener.warn({ breaker: name, state: "closed" }, "circuit closed");
    });
  }

  return breaker;
}
