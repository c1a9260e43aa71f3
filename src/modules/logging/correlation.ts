import { AsyncLocalStorage } from "node:async_hooks"
import { randomUUID } from "node:crypto"

export type CorrelationContext = {
  correlation_id: string
  workflow_name?: string
  step_name?: string
  order_id?: string
  agreement_id?: string
}

const contextStore = new AsyncLocalStorage<CorrelationContext>()

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function normalizeCorrelationId(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return normalizeCorrelationId(value[0])
  }

  const normalized = normalizeString(value)
  if (!normalized) {
    return undefined
  }

  const trimmed = normalized.slice(0, 128)
  if (!/^[A-Za-z0-9._:-]+$/.test(trimmed)) {
    return undefined
  }

  return trimmed
}

function normalizeEntityId(value: unknown): string | undefined {
  const normalized = normalizeString(value)
  if (!normalized) {
    return undefined
  }

  return normalized.slice(0, 128)
}

export function generateCorrelationId(): string {
  return randomUUID()
}

export function getCorrelationContext(): CorrelationContext | undefined {
  return contextStore.getStore()
}

export function resolveCorrelationId(explicit?: unknown): string {
  const fromExplicit = normalizeCorrelationId(explicit)
  if (fromExplicit) {
    return fromExplicit
  }

  const fromContext = normalizeCorrelationId(getCorrelationContext()?.correlation_id)
  if (fromContext) {
    return fromContext
  }

  return generateCorrelationId()
}

function buildContext(
  input: Partial<CorrelationContext>,
  existing?: CorrelationContext
): CorrelationContext {
  return {
    correlation_id: resolveCorrelationId(input.correlation_id ?? existing?.correlation_id),
    workflow_name: normalizeString(input.workflow_name ?? existing?.workflow_name),
    step_name: normalizeString(input.step_name ?? existing?.step_name),
    order_id: normalizeEntityId(input.order_id ?? existing?.order_id),
    agreement_id: normalizeEntityId(input.agreement_id ?? existing?.agreement_id),
  }
}

/**
 * Runs `fn` inside a fresh context. The correlation id is inherited from the
 * enclosing context unless `input` names one; the other fields are not.
 */
export function runWithCorrelationContext<T>(
  input: Partial<CorrelationContext>,
  fn: () => T
): T {
  return contextStore.run(buildContext(input), fn)
}

/** Merges `input` into the current context, entering one when there is none. */
export function setCorrelationContext(
  input: Partial<CorrelationContext>
): CorrelationContext {
  const existing = getCorrelationContext()
  const next = buildContext(input, existing)

  if (existing) {
    Object.assign(existing, next)
    return existing
  }

  contextStore.enterWith(next)
  return next
}
