import type { SubscriberConfig } from "@medusajs/framework"
import { readText } from "../integrations/http"
import { setCorrelationContext } from "../modules/logging/correlation"
import { type ScopeLike, logStructured } from "../modules/logging/structured-logger"
import { toAppError } from "../modules/observability/errors"
import { fulfill } from "../modules/vendor-fulfillment/fulfill"
import type { FulfillmentRuntime } from "../modules/vendor-fulfillment/runtime"
import { createRuntimeForScope } from "../modules/vendor-fulfillment/scope-runtime"

export const VENDOR_ORDER_FULFILLMENT_EVENT = "vendor-order.fulfillment-requested"

/** The part of the subscriber arguments the handler reads. */
export type VendorOrderFulfillmentArgs = {
  event?: { data?: Record<string, unknown> }
  container: ScopeLike
}

type VendorOrderFulfillmentDependencies = {
  createRuntime: (scope: ScopeLike) => FulfillmentRuntime
  fulfill: typeof fulfill
}

export function createVendorOrderFulfillmentHandler(
  dependencies?: Partial<VendorOrderFulfillmentDependencies>
) {
  const deps: VendorOrderFulfillmentDependencies = {
    createRuntime: (scope) => createRuntimeForScope(scope),
    fulfill,
    ...dependencies,
  }

  return async function vendorOrderFulfillmentSubscriber({
    event,
    container,
  }: VendorOrderFulfillmentArgs) {
    const data = event?.data ?? {}
    const orderId = readText(data.order_id ?? data.id)
    if (!orderId) {
      return
    }

    setCorrelationContext({
      correlation_id: readText(data.correlation_id) || undefined,
      workflow_name: "subscriber_vendor_order_fulfillment",
      order_id: orderId,
    })

    const runtime = deps.createRuntime(container)
    try {
      const order = await runtime.marketplace.getOrder(orderId)
      await deps.fulfill(runtime, order)
    } catch (error) {
      const appError = toAppError(error, { code: "VENDOR_FULFILLMENT_FAILED" })
      logStructured(container, "error", "vendor order fulfillment failed", {
        workflow_name: "subscriber_vendor_order_fulfillment",
        order_id: orderId,
        error_code: appError.code,
        meta: { message: appError.message },
      })
      throw error
    }
  }
}

export default createVendorOrderFulfillmentHandler()

export const config: SubscriberConfig = {
  event: VENDOR_ORDER_FULFILLMENT_EVENT,
}
