type MetricLabelValue = string | number | boolean | null | undefined
export type MetricLabels = Record<string, MetricLabelValue>

type CounterEntry = {
  name: string
  labels: Record<string, string>
  value: number
}

type TimerEntry = {
  name: string
  labels: Record<string, string>
  count: number
  sum_ms: number
  min_ms: number
  max_ms: number
  last_ms: number
}

export type MetricsSnapshot = {
  generated_at: string
  counters: CounterEntry[]
  timers: Array<
    TimerEntry & {
      avg_ms: number
    }
  >
}

export type PipelineOutcome = "completed" | "halted" | "error"

export interface MetricsRegistry {
  increment(name: string, labels?: MetricLabels): void
  observeDuration(name: string, ms: number, labels?: MetricLabels): void
  snapshot(now?: Date): MetricsSnapshot
}

function normalizeLabels(labels?: MetricLabels): Record<string, string> {
  if (!labels) {
    return {}
  }

  const normalized: Record<string, string> = {}

  for (const [key, rawValue] of Object.entries(labels)) {
    const normalizedKey = key.trim()
    if (!normalizedKey || rawValue === undefined || rawValue === null) {
      continue
    }

    const normalizedValue = String(rawValue).trim()
    if (normalizedValue) {
      normalized[normalizedKey] = normalizedValue
    }
  }

  return normalized
}

function metricKey(name: string, labels: Record<string, string>): string {
  const parts = Object.keys(labels)
    .sort((a, b) => a.localeCompare(b))
    .map((key) => `${key}=${labels[key]}`)

  return parts.length ? `${name}|${parts.join(",")}` : name
}

function toFiniteMs(value: number): number {
  if (!Number.isFinite(value)) {
    return 0
  }

  return value < 0 ? 0 : value
}

export function createMetricsRegistry(): MetricsRegistry {
  const counters = new Map<string, CounterEntry>()
  const timers = new Map<string, TimerEntry>()

  return {
    increment(name, labels) {
      const metricName = name.trim()
      if (!metricName) {
        return
      }

      const normalizedLabels = normalizeLabels(labels)
      const key = metricKey(metricName, normalizedLabels)
      const existing = counters.get(key)

      if (existing) {
        existing.value += 1
        return
      }

      counters.set(key, { name: metricName, labels: normalizedLabels, value: 1 })
    },

    observeDuration(name, ms, labels) {
      const metricName = name.trim()
      if (!metricName) {
        return
      }

      const normalizedLabels = normalizeLabels(labels)
      const key = metricKey(metricName, normalizedLabels)
      const durationMs = toFiniteMs(ms)
      const existing = timers.get(key)

      if (!existing) {
        timers.set(key, {
          name: metricName,
          labels: normalizedLabels,
          count: 1,
          sum_ms: durationMs,
          min_ms: durationMs,
          max_ms: durationMs,
          last_ms: durationMs,
        })
        return
      }

      existing.count += 1
      existing.sum_ms += durationMs
      existing.min_ms = Math.min(existing.min_ms, durationMs)
      existing.max_ms = Math.max(existing.max_ms, durationMs)
      existing.last_ms = durationMs
    },

    snapshot(now = new Date()) {
      return {
        generated_at: now.toISOString(),
        counters: Array.from(counters.values())
          .map((entry) => ({ ...entry, labels: { ...entry.labels } }))
          .sort((a, b) => a.name.localeCompare(b.name)),
        timers: Array.from(timers.values())
          .map((entry) => ({
            ...entry,
            labels: { ...entry.labels },
            avg_ms: entry.count > 0 ? entry.sum_ms / entry.count : 0,
          }))
          .sort((a, b) => a.name.localeCompare(b.name)),
      }
    },
  }
}

export function recordPipelineRun(
  metrics: MetricsRegistry,
  flow: string,
  outcome: PipelineOutcome,
  durationMs: number
): void {
  metrics.increment(`pipeline.${flow}.${outcome}_total`, { flow, outcome })
  metrics.observeDuration(`pipeline.${flow}.duration_ms`, durationMs, { flow })
}

export function recordVendorCall(
  metrics: MetricsRegistry,
  operation: string,
  success: boolean
): void {
  metrics.increment(`vendor.api.${operation}_total`, {
    operation,
    result: success ? "success" : "failure",
  })
}
