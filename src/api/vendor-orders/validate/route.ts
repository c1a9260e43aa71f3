import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import { orderSchema } from "../../../integrations/marketplace/types"
import { logEvent } from "../../../modules/logging/log-event"
import type { ScopeLike } from "../../../modules/logging/structured-logger"
import { toAppError } from "../../../modules/observability/errors"
import type { FulfillmentRuntime } from "../../../modules/vendor-fulfillment/runtime"
import { createRuntimeForScope } from "../../../modules/vendor-fulfillment/scope-runtime"
import { validate } from "../../../modules/vendor-fulfillment/validate"

export type ValidateOrderRequest = {
  body: unknown
  scope: ScopeLike
}

export type JsonResponse = {
  status: (code: number) => JsonResponse
  json: (body: unknown) => unknown
}

type ValidateRouteDependencies = {
  createRuntime: (scope: ScopeLike) => FulfillmentRuntime
  validate: typeof validate
}

/** Draft order validation: returns the order annotated with errors, never changes its status. */
export function createValidateOrderRoute(dependencies?: Partial<ValidateRouteDependencies>) {
  const deps: ValidateRouteDependencies = {
    createRuntime: (scope) => createRuntimeForScope(scope),
    validate,
    ...dependencies,
  }

  return async (req: ValidateOrderRequest, res: JsonResponse): Promise<void> => {
    const parsed = orderSchema.safeParse(req.body)
    if (!parsed.success) {
      res.status(400).json({
        code: "ORDER_DATA_INVALID",
        message: "Request body is not a valid order.",
        details: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      })
      return
    }

    try {
      const result = await deps.validate(deps.createRuntime(req.scope), parsed.data)
      res.status(200).json(result)
    } catch (error) {
      const appError = toAppError(error)
      logEvent(
        "vendor_order.validation_failed",
        { order_id: parsed.data.id, message: appError.message },
        undefined,
        { level: "error", target: req.scope, error_code: appError.code }
      )
      res.status(appError.category === "validation" ? 400 : 500).json({
        code: appError.code,
        message: appError.message,
      })
    }
  }
}

export const POST: (req: MedusaRequest, res: MedusaResponse) => Promise<void> =
  createValidateOrderRoute()
