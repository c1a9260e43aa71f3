import type { ScopeLike } from "../logging/structured-logger"
import { loadFulfillmentConfig } from "./config"
import { type FulfillmentRuntime, createFulfillmentRuntime } from "./runtime"

/** Runtime for a subscriber, job or route invocation, logging through the scope's logger. */
export function createRuntimeForScope(
  scope: ScopeLike,
  env: Record<string, unknown> = process.env
): FulfillmentRuntime {
  return createFulfillmentRuntime(loadFulfillmentConfig(env), { logger: scope })
}
