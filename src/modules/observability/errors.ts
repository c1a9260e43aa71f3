export type ErrorCategory =
  | "validation"
  | "integrity"
  | "transient_external"
  | "permanent_external"
  | "internal"

type AppErrorOptions = {
  details?: Record<string, unknown>
  cause?: unknown
}

type AppErrorInput = {
  code: string
  message: string
  category: ErrorCategory
  details?: Record<string, unknown>
  cause?: unknown
}

const KNOWN_ERROR_CODE_CATEGORIES: Record<string, ErrorCategory> = {
  FULFILLMENT_CONFIG_INVALID: "validation",
  UNSUPPORTED_ORDER_TYPE: "validation",
  ORDER_DATA_INVALID: "integrity",
  VENDOR_API_ERROR: "permanent_external",
  VENDOR_HTTP_ERROR: "transient_external",
  MARKETPLACE_API_ERROR: "permanent_external",
}

function normalizeText(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class AppError extends Error {
  code: string
  category: ErrorCategory
  details?: Record<string, unknown>

  constructor(input: AppErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause })
    this.name = "AppError"
    this.code = input.code
    this.category = input.category
    this.details = input.details
  }
}

function build(category: ErrorCategory) {
  return (code: string, message: string, options: AppErrorOptions = {}): AppError =>
    new AppError({
      code,
      message,
      category,
      details: options.details,
      cause: options.cause,
    })
}

export const validationError = build("validation")
export const integrityError = build("integrity")
export const transientExternalError = build("transient_external")
export const permanentExternalError = build("permanent_external")
export const internalError = build("internal")

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Normalises anything thrown into an AppError. Errors carrying a known string
 * `code` keep it and get that code's category; everything else becomes an
 * internal error wrapping the original as `cause`.
 */
export function toAppError(
  error: unknown,
  fallback: { code?: string; message?: string } = {}
): AppError {
  if (isAppError(error)) {
    return error
  }

  const fallbackCode = fallback.code ?? "INTERNAL_ERROR"
  const fallbackMessage = fallback.message ?? "An unexpected error occurred."

  if (!isRecord(error) && !(error instanceof Error)) {
    return internalError(fallbackCode, fallbackMessage, { cause: error })
  }

  const code = "code" in error ? normalizeText(error.code) : undefined
  const message = ("message" in error ? normalizeText(error.message) : undefined) ?? fallbackMessage
  const rawDetails = "details" in error ? error.details : undefined
  const details = isRecord(rawDetails) ? rawDetails : undefined

  const category = code ? KNOWN_ERROR_CODE_CATEGORIES[code] : undefined
  if (!code || !category) {
    return internalError(code ?? fallbackCode, message, { details, cause: error })
  }

  return new AppError({ code, message, category, details, cause: error })
}
