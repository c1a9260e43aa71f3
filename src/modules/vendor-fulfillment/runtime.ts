import type { FetchLike } from "../../integrations/http"
import { type MarketplaceApi, MarketplaceClient } from "../../integrations/marketplace/client"
import { type Notifier, createNotifier } from "../../integrations/notifications/notifier"
import { type VendorApi, VendorClient } from "../../integrations/vendor/client"
import type { LogTarget } from "../logging/structured-logger"
import { type MetricsRegistry, createMetricsRegistry } from "../observability/metrics"
import type { FulfillmentConfig } from "./config"

/**
 * Everything a pipeline run talks to. Built once per process (or per
 * subscriber invocation) and passed down explicitly.
 */
export type FulfillmentRuntime = {
  config: FulfillmentConfig
  vendor: VendorApi
  marketplace: MarketplaceApi
  notifier: Notifier
  metrics: MetricsRegistry
  logger?: LogTarget
  now: () => Date
}

export type FulfillmentRuntimeOverrides = Partial<Omit<FulfillmentRuntime, "config">> & {
  fetch?: FetchLike
}

export function createFulfillmentRuntime(
  config: FulfillmentConfig,
  overrides: FulfillmentRuntimeOverrides = {}
): FulfillmentRuntime {
  const now = overrides.now ?? (() => new Date())
  const metrics = overrides.metrics ?? createMetricsRegistry()
  const { fetch, logger } = overrides

  return {
    config,
    now,
    metrics,
    logger,
    vendor:
      overrides.vendor ??
      new VendorClient(config.vendor, { fetch, now, metrics, logger }),
    marketplace: overrides.marketplace ?? new MarketplaceClient(config.marketplace, { fetch, logger }),
    notifier: overrides.notifier ?? createNotifier(config.exceptionWebhookUrl, { fetch, logger }),
  }
}

export function todayIso(runtime: Pick<FulfillmentRuntime, "now">): string {
  return runtime.now().toISOString().slice(0, 10)
}

export function addDaysIso(date: string, days: number): string {
  const parsed = new Date(`${date}T00:00:00.000Z`)
  parsed.setUTCDate(parsed.getUTCDate() + days)
  return parsed.toISOString().slice(0, 10)
}
