import type { OrderError } from "../../integrations/marketplace/types"
import { MarketplaceOrderStatus } from "../../integrations/marketplace/types"
import { logStructured } from "../logging/structured-logger"
import { FulfillmentParam, type OrderingParam, TemplateName } from "./constants"
import type { FulfillmentContext, ValidationMode } from "./context"
import { setFulfillmentValue, setOrderingParameterError, withParameters } from "./parameters"
import { StepResult } from "./pipeline"
import type { FulfillmentRuntime } from "./runtime"

function logTransition(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  status: string,
  meta: Record<string, unknown> = {}
): void {
  logStructured(runtime.logger, "info", "order.status.changed", {
    order_id: context.orderId,
    agreement_id: context.agreementId,
    meta: { status, order_type: context.orderType, ...meta },
  })
}

/** Sends the current parameter set; the marketplace has no partial merge. */
export async function persistParameters(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext
): Promise<void> {
  await runtime.marketplace.updateOrder(context.orderId, {
    parameters: context.order.parameters,
  })
}

export async function switchOrderToFailed(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  error: OrderError
): Promise<void> {
  context.order = await runtime.marketplace.failOrder(context.orderId, {
    reason: error.message,
    error,
    parameters: context.order.parameters,
  })
  logTransition(runtime, context, MarketplaceOrderStatus.FAILED, { error_id: error.id, reason: error.message })
}

/** Returns the order to the submitter for corrections; the retry count restarts. */
export async function switchOrderToQuery(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext
): Promise<void> {
  context.order = setFulfillmentValue(context.order, FulfillmentParam.RETRY_COUNT, "0")
  const template = await runtime.marketplace.getProductTemplateOrDefault(
    context.productId,
    MarketplaceOrderStatus.QUERYING,
    TemplateName.QUERYING
  )

  context.order = await runtime.marketplace.queryOrder(context.orderId, {
    templateId: template?.id,
    parameters: context.order.parameters,
  })
  logTransition(runtime, context, MarketplaceOrderStatus.QUERYING)
}

export async function switchOrderToCompleted(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  templateName: string
): Promise<void> {
  // getParameterText reads a blank as unset, so "" clears the due date
  context.order = setFulfillmentValue(context.order, FulfillmentParam.DUE_DATE, "")
  context.order = setFulfillmentValue(context.order, FulfillmentParam.RETRY_COUNT, "0")

  const template = await runtime.marketplace.getProductTemplateOrDefault(
    context.productId,
    MarketplaceOrderStatus.COMPLETED,
    templateName
  )

  context.order = await runtime.marketplace.completeOrder(context.orderId, {
    templateId: template?.id,
    parameters: context.order.parameters,
  })
  logTransition(runtime, context, MarketplaceOrderStatus.COMPLETED, { template: templateName })
}

/**
 * Order-level business error. Enforcing runs fail the order; validating runs
 * attach the error to the draft and stop further mutation.
 */
export async function reportOrderError(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  mode: ValidationMode,
  error: OrderError
): Promise<StepResult> {
  if (mode === "enforcing") {
    await switchOrderToFailed(runtime, context, error)
    return StepResult.HALT
  }

  context.order = { ...context.order, error }
  context.validationSucceeded = false
  return StepResult.HALT
}

/** Error tied to one ordering parameter: the submitter must correct that field. */
export async function reportParameterError(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  mode: ValidationMode,
  parameter: OrderingParam | readonly OrderingParam[],
  error: OrderError,
  options: { required?: boolean } = {}
): Promise<StepResult> {
  const names: readonly OrderingParam[] = typeof parameter === "string" ? [parameter] : parameter
  let parameters = context.order.parameters
  for (const name of names) {
    parameters = setOrderingParameterError(parameters, name, error, options)
  }
  context.order = withParameters(context.order, parameters)

  if (mode === "enforcing") {
    await switchOrderToQuery(runtime, context)
    return StepResult.HALT
  }

  context.validationSucceeded = false
  return StepResult.HALT
}

/** Links the order to the vendor order (or transfer) placed for it, so retries reuse it. */
export async function saveVendorOrderId(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  vendorOrderId: string
): Promise<void> {
  context.vendorNewOrderId = vendorOrderId
  context.order = {
    ...context.order,
    externalIds: { ...context.order.externalIds, vendor: vendorOrderId },
  }
  await runtime.marketplace.updateOrder(context.orderId, {
    externalIds: context.order.externalIds,
  })
  logStructured(runtime.logger, "info", "vendor.order.linked", {
    order_id: context.orderId,
    meta: { vendor_order_id: vendorOrderId, order_type: context.orderType },
  })
}
