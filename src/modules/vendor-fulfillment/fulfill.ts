import type { Order } from "../../integrations/marketplace/types"
import { runWithCorrelationContext } from "../logging/correlation"
import { logStructured } from "../logging/structured-logger"
import { toAppError } from "../observability/errors"
import { resolveMarketSegment } from "./config"
import { type FulfillmentContext, OrderType, createContext } from "./context"
import { createChangeFlow } from "./flows/change"
import { createConfigurationFlow } from "./flows/configuration"
import { createPurchaseFlow } from "./flows/purchase"
import { createResellerChangeFlow } from "./flows/reseller-change"
import { createTerminationFlow } from "./flows/termination"
import { createTransferFlow } from "./flows/transfer"
import { resolveOrderType } from "./order-type"
import type { Pipeline, PipelineErrorHandler, PipelineRunResult } from "./pipeline"
import type { FulfillmentRuntime } from "./runtime"

export function selectFlow(orderType: OrderType): Pipeline {
  switch (orderType) {
    case OrderType.PURCHASE:
      return createPurchaseFlow()
    case OrderType.CHANGE:
      return createChangeFlow()
    case OrderType.TERMINATION:
      return createTerminationFlow()
    case OrderType.TRANSFER:
      return createTransferFlow()
    case OrderType.RESELLER_CHANGE:
      return createResellerChangeFlow()
    case OrderType.CONFIGURATION:
      return createConfigurationFlow()
  }
}

function formatStack(error: unknown): string {
  const stack = error instanceof Error && error.stack ? error.stack : String(error)
  return stack.split(process.cwd()).join("")
}

function createExceptionHandler(runtime: FulfillmentRuntime): PipelineErrorHandler {
  return async (error, context: FulfillmentContext, stepName) => {
    const appError = toAppError(error)
    logStructured(runtime.logger, "error", "fulfillment.step.failed", {
      step_name: stepName,
      order_id: context.orderId,
      agreement_id: context.agreementId,
      error_code: appError.code,
      meta: { category: appError.category, message: appError.message },
    })

    try {
      await runtime.notifier.notifyException({
        title: `Order fulfillment error in ${stepName}`,
        text: [
          `Order ${context.orderId} (${context.orderType}) failed in step ${stepName}.`,
          formatStack(error),
        ].join("\n\n"),
      })
    } catch (notifyError) {
      const failure = toAppError(notifyError)
      logStructured(runtime.logger, "warn", "notification.failed", {
        step_name: stepName,
        order_id: context.orderId,
        error_code: failure.code,
        meta: { message: failure.message },
      })
    }

    throw error
  }
}

/**
 * Runs the flow for the order from its first step. Every run is a fresh
 * attempt; progress survives in the order's parameters and external ids.
 */
export async function fulfill(runtime: FulfillmentRuntime, order: Order): Promise<PipelineRunResult> {
  const orderType = resolveOrderType(order)
  const flow = selectFlow(orderType)

  return runWithCorrelationContext(
    { workflow_name: flow.name, order_id: order.id, agreement_id: order.agreement.id },
    async () => {
      const marketSegment = resolveMarketSegment(runtime.config, order.product.id)
      const context = createContext(order, orderType, marketSegment)
      const result = await flow.run(runtime, context, createExceptionHandler(runtime))
      logStructured(runtime.logger, "info", "fulfillment.run.finished", {
        workflow_name: flow.name,
        order_id: order.id,
        meta: { completed: result.completed, halted_at: result.haltedAt ?? null, steps_run: result.stepsRun },
      })
      return result
    }
  )
}
