import { z } from "zod"
import { DEFAULT_MARKET_SEGMENT, MarketSegment } from "./constants"

export type FulfillmentConfig = {
  vendor: {
    baseUrl: string
    authUrl: string
    clientId: string
    clientSecret: string
    token?: string
    resellerId?: string
  }
  marketplace: {
    baseUrl: string
    token: string
  }
  dueDateDays: number
  maxRetryAttempts: number
  orderCreationWindowHours: number
  maxReturnableCandidates: number
  productIds: string[]
  /** Market segment per product id; products not listed are commercial. */
  productSegments: Record<string, MarketSegment>
  previewCustomerId?: string
  exceptionWebhookUrl?: string
}

export class FulfillmentConfigError extends Error {
  code: string
  reason: string
  details: Record<string, unknown>

  constructor(input: {
    code: string
    reason: string
    details?: Record<string, unknown>
  }) {
    super(input.code)
    this.name = "FulfillmentConfigError"
    this.code = input.code
    this.reason = input.reason
    this.details = input.details ?? {}
  }
}

export const DEFAULT_RESUME_CRON = "*/15 * * * *"

function readText(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

const requiredText = z.string({ required_error: "is required." }).min(1, "is required.")
const url = requiredText.url("must be a valid URL.")

function positiveInt(fallback: number) {
  return z.coerce
    .number({ invalid_type_error: "must be a number." })
    .int("must be an integer.")
    .positive("must be positive.")
    .default(fallback)
}

const segmentSchema = z.enum([
  MarketSegment.COMMERCIAL,
  MarketSegment.EDUCATION,
  MarketSegment.GOVERNMENT,
  MarketSegment.LARGE_GOVERNMENT_AGENCY,
])

/** `PRD-1=EDU,PRD-2=GOV` */
const productSegments = z
  .string()
  .default("")
  .transform((value, ctx) => {
    const segments: Record<string, MarketSegment> = {}
    for (const entry of value.split(",").map((part) => part.trim()).filter(Boolean)) {
      const [productId = "", segment = ""] = entry.split("=").map((part) => part.trim())
      const parsed = segmentSchema.safeParse(segment)
      if (!productId || !parsed.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `has an invalid entry "${entry}".`,
        })
        return z.NEVER
      }
      segments[productId] = parsed.data
    }
    return segments
  })

const EnvSchema = z.object({
  VENDOR_API_BASE_URL: url,
  VENDOR_API_AUTH_URL: url.optional(),
  VENDOR_API_CLIENT_ID: requiredText,
  VENDOR_API_CLIENT_SECRET: requiredText,
  VENDOR_API_TOKEN: requiredText.optional(),
  VENDOR_RESELLER_ID: requiredText.optional(),
  MARKETPLACE_API_BASE_URL: url,
  MARKETPLACE_API_TOKEN: requiredText,
  FULFILLMENT_DUE_DATE_DAYS: positiveInt(30),
  FULFILLMENT_MAX_RETRY_ATTEMPTS: positiveInt(10),
  FULFILLMENT_ORDER_CREATION_WINDOW_HOURS: positiveInt(24),
  FULFILLMENT_MAX_RETURNABLE_CANDIDATES: positiveInt(16),
  FULFILLMENT_PRODUCT_IDS: z.string().default(""),
  FULFILLMENT_PRODUCT_SEGMENTS: productSegments,
  FULFILLMENT_PREVIEW_CUSTOMER_ID: requiredText.optional(),
  FULFILLMENT_EXCEPTION_WEBHOOK_URL: url.optional(),
})

const ENV_KEYS = Object.keys(EnvSchema.shape)

function trimBaseUrl(value: string): string {
  return value.replace(/\/+$/, "")
}

/**
 * Reads the extension settings from the environment. Blank values count as
 * unset so that `.env.template` placeholders fall back to their defaults.
 */
export function loadFulfillmentConfig(
  env: Record<string, unknown> = process.env
): FulfillmentConfig {
  const input: Record<string, string | undefined> = {}
  for (const key of ENV_KEYS) {
    input[key] = readText(env[key])
  }

  const parsed = EnvSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = String(issue?.path[0] ?? "environment")

    throw new FulfillmentConfigError({
      code: "FULFILLMENT_CONFIG_INVALID",
      reason: `${field} ${issue?.message ?? "is invalid."}`,
      details: {
        field,
        issues: parsed.error.issues.map((entry) => ({
          field: String(entry.path[0] ?? ""),
          message: entry.message,
        })),
      },
    })
  }

  const values = parsed.data
  const vendorBaseUrl = trimBaseUrl(values.VENDOR_API_BASE_URL)

  return {
    vendor: {
      baseUrl: vendorBaseUrl,
      authUrl: values.VENDOR_API_AUTH_URL ?? `${vendorBaseUrl}/oauth/token`,
      clientId: values.VENDOR_API_CLIENT_ID,
      clientSecret: values.VENDOR_API_CLIENT_SECRET,
      token: values.VENDOR_API_TOKEN,
      resellerId: values.VENDOR_RESELLER_ID,
    },
    marketplace: {
      baseUrl: trimBaseUrl(values.MARKETPLACE_API_BASE_URL),
      token: values.MARKETPLACE_API_TOKEN,
    },
    dueDateDays: values.FULFILLMENT_DUE_DATE_DAYS,
    maxRetryAttempts: values.FULFILLMENT_MAX_RETRY_ATTEMPTS,
    orderCreationWindowHours: values.FULFILLMENT_ORDER_CREATION_WINDOW_HOURS,
    maxReturnableCandidates: values.FULFILLMENT_MAX_RETURNABLE_CANDIDATES,
    productIds: values.FULFILLMENT_PRODUCT_IDS.split(",")
      .map((entry) => entry.trim())
      .filter(Boolean),
    productSegments: values.FULFILLMENT_PRODUCT_SEGMENTS,
    previewCustomerId: values.FULFILLMENT_PREVIEW_CUSTOMER_ID,
    exceptionWebhookUrl: values.FULFILLMENT_EXCEPTION_WEBHOOK_URL,
  }
}

export function resolveMarketSegment(
  config: Pick<FulfillmentConfig, "productSegments">,
  productId: string
): MarketSegment {
  return config.productSegments[productId] ?? DEFAULT_MARKET_SEGMENT
}

/** Read on its own: the job schedule is needed at module load, before the rest is validated. */
export function resolveResumeCron(env: Record<string, unknown> = process.env): string {
  return readText(env.FULFILLMENT_RESUME_CRON) ?? DEFAULT_RESUME_CRON
}
