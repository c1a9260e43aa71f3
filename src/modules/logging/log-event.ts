import { resolveCorrelationId } from "./correlation"
import { type LogTarget, type StructuredLogLevel, logStructured } from "./structured-logger"

type LogEventOptions = {
  level?: StructuredLogLevel
  target?: LogTarget
  error_code?: string
}

export function logEvent(
  eventName: string,
  payload: Record<string, unknown> = {},
  correlation_id?: string,
  options: LogEventOptions = {}
): Record<string, unknown> {
  const correlationId = resolveCorrelationId(correlation_id)

  return logStructured(options.target, options.level ?? "info", eventName, {
    correlation_id: correlationId,
    error_code: options.error_code,
    meta: payload,
  })
}
