import type { Order } from "../../integrations/marketplace/types"
import { runWithCorrelationContext } from "../logging/correlation"
import { logStructured } from "../logging/structured-logger"
import { resolveMarketSegment } from "./config"
import { OrderType, createContext } from "./context"
import { resolveOrderType } from "./order-type"
import { resetOrderingErrors, withParameters } from "./parameters"
import type { Pipeline } from "./pipeline"
import type { FulfillmentRuntime } from "./runtime"
import { createChangeValidation } from "./validation/change"
import { createPurchaseValidation } from "./validation/purchase"
import { createResellerChangeValidation } from "./validation/reseller-change"
import { createTerminationValidation } from "./validation/termination"
import { createTransferValidation } from "./validation/transfer"

export type DraftValidationResult = {
  hasErrors: boolean
  order: Order
}

function selectValidation(orderType: OrderType): Pipeline | undefined {
  switch (orderType) {
    case OrderType.PURCHASE:
      return createPurchaseValidation()
    case OrderType.CHANGE:
      return createChangeValidation()
    case OrderType.TERMINATION:
      return createTerminationValidation()
    case OrderType.TRANSFER:
      return createTransferValidation()
    case OrderType.RESELLER_CHANGE:
      return createResellerChangeValidation()
    default:
      return undefined
  }
}

/**
 * Checks a draft order without placing anything at the vendor. Errors are
 * attached to the returned order (order error or parameter errors).
 */
export async function validate(runtime: FulfillmentRuntime, order: Order): Promise<DraftValidationResult> {
  const orderType = resolveOrderType(order)
  const pipeline = selectValidation(orderType)
  if (!pipeline) {
    return { hasErrors: false, order }
  }

  const draft = { ...withParameters(order, resetOrderingErrors(order.parameters)), error: null }
  return runWithCorrelationContext({ workflow_name: pipeline.name, order_id: order.id }, async () => {
    const marketSegment = resolveMarketSegment(runtime.config, order.product.id)
    const context = createContext(draft, orderType, marketSegment)
    await pipeline.run(runtime, context)

    logStructured(runtime.logger, "info", "validation.finished", {
      workflow_name: pipeline.name,
      order_id: order.id,
      meta: { has_errors: !context.validationSucceeded },
    })
    return { hasErrors: !context.validationSucceeded, order: context.order }
  })
}
