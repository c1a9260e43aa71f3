import type { MedusaContainer } from "@medusajs/framework/types"
import { MarketplaceOrderStatus } from "../integrations/marketplace/types"
import { logStructured, type ScopeLike } from "../modules/logging/structured-logger"
import { toAppError } from "../modules/observability/errors"
import { resolveResumeCron } from "../modules/vendor-fulfillment/config"
import { fulfill } from "../modules/vendor-fulfillment/fulfill"
import type { FulfillmentRuntime } from "../modules/vendor-fulfillment/runtime"
import { createRuntimeForScope } from "../modules/vendor-fulfillment/scope-runtime"

export type ResumeSummary = {
  scanned: number
  failed: number
}

/**
 * Re-runs every Processing order of the configured products. Orders waiting
 * on the vendor advance or halt again; one order's failure does not stop
 * the others.
 */
export async function resumeVendorFulfillment(
  scope: ScopeLike,
  runtime: FulfillmentRuntime,
  run: typeof fulfill = fulfill
): Promise<ResumeSummary> {
  const orders = await runtime.marketplace.listOrders({
    status: MarketplaceOrderStatus.PROCESSING,
    productIds: runtime.config.productIds,
  })

  let failed = 0
  for (const order of orders) {
    try {
      await run(runtime, order)
    } catch (error) {
      failed += 1
      const appError = toAppError(error)
      logStructured(scope, "error", "vendor fulfillment resume failed", {
        workflow_name: "job_resume_vendor_fulfillment",
        order_id: order.id,
        error_code: appError.code,
        meta: { message: appError.message },
      })
    }
  }

  logStructured(scope, "info", "vendor fulfillment resume finished", {
    workflow_name: "job_resume_vendor_fulfillment",
    meta: { scanned: orders.length, failed },
  })

  return { scanned: orders.length, failed }
}

export default async function resumeVendorFulfillmentJob(container: MedusaContainer) {
  await resumeVendorFulfillment(container, createRuntimeForScope(container))
}

export const config = {
  name: "resume-vendor-fulfillment",
  schedule: resolveResumeCron(),
}
