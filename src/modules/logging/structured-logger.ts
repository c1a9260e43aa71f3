import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import { getCorrelationContext, resolveCorrelationId } from "./correlation"

export type StructuredLogLevel = "debug" | "info" | "warn" | "error"

export type LoggerLike = {
  info?: (message: string) => void
  warn?: (message: string) => void
  error?: (message: string) => void
  debug?: (message: string) => void
}

export type ScopeLike = {
  resolve: (key: string) => unknown
}

export type LogTarget = ScopeLike | LoggerLike | undefined

export type StructuredLogInput = {
  correlation_id?: string
  workflow_name?: string
  step_name?: string
  order_id?: string
  agreement_id?: string
  error_code?: string
  meta?: Record<string, unknown>
}

const SECRET_KEY_PATTERN =
  /(secret|token|password|authorization|cookie|api[_-]?key|private[_-]?key)/i
const REDACTED = "[REDACTED]"

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function sanitizeLogValue(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (depth > 3) {
    return "[TRUNCATED]"
  }

  if (typeof value === "string") {
    return value.length > 300 ? `${value.slice(0, 300)}...` : value
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return value
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message }
  }

  if (Array.isArray(value)) {
    return value.slice(0, 25).map((item) => sanitizeLogValue(item, depth + 1))
  }

  if (isRecord(value)) {
    const sanitized: Record<string, unknown> = {}

    for (const [key, nestedValue] of Object.entries(value)) {
      sanitized[key] = SECRET_KEY_PATTERN.test(key)
        ? REDACTED
        : sanitizeLogValue(nestedValue, depth + 1)
    }

    return sanitized
  }

  return String(value)
}

function isLoggerLike(value: unknown): value is LoggerLike {
  if (!isRecord(value)) {
    return false
  }

  return (
    typeof value.info === "function" ||
    typeof value.warn === "function" ||
    typeof value.error === "function"
  )
}

function isScopeLike(value: unknown): value is ScopeLike {
  return isRecord(value) && typeof value.resolve === "function"
}

export function resolveLogger(target: LogTarget): LoggerLike | undefined {
  if (!target) {
    return undefined
  }

  if (isLoggerLike(target)) {
    return target
  }

  if (!isScopeLike(target)) {
    return undefined
  }

  try {
    const resolved =
      target.resolve(ContainerRegistrationKeys.LOGGER) ?? target.resolve("logger")
    return isLoggerLike(resolved) ? resolved : undefined
  } catch {
    // scopes throw on unregistered keys; fall back to console
    return undefined
  }
}

function buildMeta(input: StructuredLogInput): Record<string, unknown> | undefined {
  if (!input.meta) {
    return undefined
  }

  const sanitized = sanitizeLogValue(input.meta)
  if (!isRecord(sanitized) || Object.keys(sanitized).length === 0) {
    return undefined
  }

  return sanitized
}

function toPayload(
  level: StructuredLogLevel,
  message: string,
  input: StructuredLogInput
): Record<string, unknown> {
  const context = getCorrelationContext()
  const correlationId = resolveCorrelationId(
    input.correlation_id ?? context?.correlation_id
  )

  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
    correlation_id: correlationId,
  }

  const workflowName = normalizeString(input.workflow_name ?? context?.workflow_name)
  const stepName = normalizeString(input.step_name ?? context?.step_name)
  const orderId = normalizeString(input.order_id ?? context?.order_id)
  const agreementId = normalizeString(input.agreement_id ?? context?.agreement_id)
  const errorCode = normalizeString(input.error_code)

  if (workflowName) {
    payload.workflow_name = workflowName
  }
  if (stepName) {
    payload.step_name = stepName
  }
  if (orderId) {
    payload.order_id = orderId
  }
  if (agreementId) {
    payload.agreement_id = agreementId
  }
  if (errorCode) {
    payload.error_code = errorCode
  }

  const meta = buildMeta(input)
  if (meta) {
    payload.meta = meta
  }

  return payload
}

export function logStructured(
  target: LogTarget,
  level: StructuredLogLevel,
  message: string,
  input: StructuredLogInput = {}
): Record<string, unknown> {
  const payload = toPayload(level, message, input)
  const serialized = JSON.stringify(payload)
  const logger = resolveLogger(target)

  const write = logger?.[level] ?? logger?.info
  if (write) {
    write.call(logger, serialized)
    return payload
  }

  if (level === "error") {
    console.error(serialized)
  } else if (level === "warn") {
    console.warn(serialized)
  } else if (level === "debug") {
    console.debug(serialized)
  } else {
    console.log(serialized)
  }

  return payload
}
