import { MarketplaceOrderStatus } from "../../../integrations/marketplace/types"
import { isVendorApiError } from "../../../integrations/vendor/errors"
import type { PreviewLineRequest } from "../../../integrations/vendor/types"
import { logStructured } from "../../logging/structured-logger"
import { getCommitment, getCommitmentRequest } from "../commitment"
import { FulfillmentParam } from "../constants"
import type { FulfillmentContext, ValidationMode } from "../context"
import { checkVendorStatus } from "../due-date"
import { extLineItemNumber, findLineSubscription, lineSku } from "../lines"
import {
  ERR_DUPLICATED_ITEMS,
  ERR_EXISTING_ITEMS,
  ERR_RENEWAL_WINDOW,
  ERR_SKU_NOT_FOUND,
  ERR_VENDOR_ERROR,
  formatOrderError,
} from "../order-errors"
import {
  persistParameters,
  reportOrderError,
  saveVendorOrderId,
  switchOrderToCompleted,
  switchOrderToFailed,
} from "../order-status"
import { getCotermDate, getDueDate, getFulfillmentText, setFulfillmentValue } from "../parameters"
import { type Step, StepResult } from "../pipeline"
import { type FulfillmentRuntime, addDaysIso } from "../runtime"

/** Loads the vendor customer and the vendor order already placed for this order, if any. */
export class SetupContext implements Step {
  readonly name = "SetupContext"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    if (context.vendorCustomerId) {
      context.vendorCustomer = await runtime.vendor.getCustomer(context.vendorCustomerId)
    }

    context.vendorNewOrderId = context.order.externalIds.vendor
    logStructured(runtime.logger, "debug", "context.ready", {
      order_id: context.orderId,
      agreement_id: context.agreementId,
      meta: {
        order_type: context.orderType,
        customer_id: context.vendorCustomerId ?? null,
        downsize_lines: context.downsizeLines.length,
        upsize_lines: context.upsizeLines.length,
        new_lines: context.newLines.length,
      },
    })

    return StepResult.NEXT
  }
}

/** Switches the order to its "processing" template on the first run. */
export class StartOrderProcessing implements Step {
  readonly name = "StartOrderProcessing"
  private readonly templateName: string

  constructor(templateName: string) {
    this.templateName = templateName
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const template = await runtime.marketplace.getProductTemplateOrDefault(
      context.productId,
      MarketplaceOrderStatus.PROCESSING,
      this.templateName
    )

    if (template && context.order.template?.id !== template.id) {
      await runtime.marketplace.updateOrder(context.orderId, { template: { id: template.id } })
      context.order = { ...context.order, template }
    }

    if (!getDueDate(context.order)) {
      logStructured(runtime.logger, "info", "order.processing.started", {
        order_id: context.orderId,
        meta: { template: this.templateName },
      })
    }

    return StepResult.NEXT
  }
}

/**
 * Mirrors the customer's anniversary date and 3YC dates into fulfillment
 * parameters. Writes only when something changed.
 */
export class SetOrUpdateCotermDate implements Step {
  readonly name = "SetOrUpdateCotermDate"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customer = context.vendorCustomer
    if (!customer?.cotermDate) {
      return StepResult.NEXT
    }

    const cotermDate = customer.cotermDate.slice(0, 10)
    const updates: Array<[FulfillmentParam, string]> = [
      [FulfillmentParam.COTERM_DATE, cotermDate],
      [FulfillmentParam.NEXT_SYNC, addDaysIso(cotermDate, 1)],
    ]

    const commitment = getCommitment(customer)
    if (commitment) {
      updates.push(
        [FulfillmentParam.COMMITMENT_ENROLL_STATUS, commitment.status],
        [FulfillmentParam.COMMITMENT_START_DATE, commitment.startDate],
        [FulfillmentParam.COMMITMENT_END_DATE, commitment.endDate]
      )
    }
    const request = getCommitmentRequest(customer)
    if (request) {
      updates.push([FulfillmentParam.COMMITMENT_REQUEST_STATUS, request.status])
    }

    let changed = false
    for (const [name, value] of updates) {
      if (value && getFulfillmentText(context.order, name) !== value) {
        context.order = setFulfillmentValue(context.order, name, value)
        changed = true
      }
    }

    if (changed) {
      await persistParameters(runtime, context)
    }

    return StepResult.NEXT
  }
}

/**
 * The vendor rejects orders in the hours before the anniversary date, when the
 * renewal is being prepared.
 */
export class ValidateRenewalWindow implements Step {
  readonly name = "ValidateRenewalWindow"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "enforcing") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const cotermDate = (context.vendorCustomer?.cotermDate ?? getCotermDate(context.order))?.slice(0, 10)
    if (!cotermDate) {
      return StepResult.NEXT
    }

    const hours = runtime.config.orderCreationWindowHours
    const windowStartMs = new Date(`${cotermDate}T00:00:00.000Z`).getTime() - hours * 60 * 60 * 1000
    if (runtime.now().getTime() < windowStartMs) {
      return StepResult.NEXT
    }

    return reportOrderError(
      runtime,
      context,
      this.mode,
      formatOrderError(ERR_RENEWAL_WINDOW, { hours, coterm_date: cotermDate })
    )
  }
}

export class ValidateDuplicateLines implements Step {
  readonly name = "ValidateDuplicateLines"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "enforcing") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const seen = new Set<string>()
    const duplicates = new Set<string>()
    for (const line of context.order.lines) {
      if (seen.has(line.item.id)) {
        duplicates.add(line.item.id)
      }
      seen.add(line.item.id)
    }

    if (duplicates.size) {
      return reportOrderError(
        runtime,
        context,
        this.mode,
        formatOrderError(ERR_DUPLICATED_ITEMS, { duplicates: [...duplicates].join(", ") })
      )
    }

    const agreementItems = new Set(
      context.order.agreement.subscriptions.flatMap((subscription) =>
        subscription.lines.map((line) => line.item?.id).filter((id): id is string => Boolean(id))
      )
    )
    const existing = context.newLines
      .map((line) => line.item.id)
      .filter((itemId) => agreementItems.has(itemId))

    if (existing.length) {
      return reportOrderError(
        runtime,
        context,
        this.mode,
        formatOrderError(ERR_EXISTING_ITEMS, { duplicates: existing.join(", ") })
      )
    }

    return StepResult.NEXT
  }
}

/**
 * Builds the vendor PREVIEW order for upsized and new lines. Upsizes reuse
 * seats a previous downsize only removed from the renewal, so the preview
 * asks for the remainder.
 */
export class GetPreviewOrder implements Step {
  readonly name = "GetPreviewOrder"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "enforcing") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    if (context.vendorNewOrderId || (!context.upsizeLines.length && !context.newLines.length)) {
      return StepResult.NEXT
    }

    const customerId = context.vendorCustomerId ?? runtime.config.previewCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    const lines: PreviewLineRequest[] = []
    let position = 0
    for (const line of context.upsizeLines) {
      position += 1
      const subscriptionId = findLineSubscription(context.order, line)?.externalIds.vendor
      if (!subscriptionId || !context.vendorCustomerId) {
        return reportOrderError(
          runtime,
          context,
          this.mode,
          formatOrderError(ERR_SKU_NOT_FOUND, { sku: lineSku(line) })
        )
      }

      const subscription = await runtime.vendor.getSubscription(customerId, subscriptionId)
      const renewal = subscription.autoRenewal.renewalQuantity
      const unrenewed =
        renewal < subscription.currentQuantity ? subscription.currentQuantity - renewal : 0
      const quantity = line.quantity - line.oldQuantity - unrenewed
      if (quantity > 0) {
        lines.push({
          extLineItemNumber: extLineItemNumber(line, position),
          offerId: lineSku(line),
          quantity,
        })
      }
    }

    for (const line of context.newLines) {
      position += 1
      lines.push({
        extLineItemNumber: extLineItemNumber(line, position),
        offerId: lineSku(line),
        quantity: line.quantity,
      })
    }

    if (!lines.length) {
      return StepResult.NEXT
    }

    try {
      context.vendorPreviewOrder = await runtime.vendor.createPreviewOrder({
        customerId,
        orderId: context.orderId,
        currency: context.currency,
        lines,
      })
    } catch (error) {
      if (!isVendorApiError(error)) {
        throw error
      }

      return reportOrderError(
        runtime,
        context,
        this.mode,
        formatOrderError(ERR_VENDOR_ERROR, { details: error.message })
      )
    }

    return StepResult.NEXT
  }
}

/**
 * Places the NEW order from the preview once, stores its id on the order and
 * waits for the vendor to process it.
 */
export class SubmitNewOrder implements Step {
  readonly name = "SubmitNewOrder"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    if (!customerId || (!context.upsizeLines.length && !context.newLines.length)) {
      return StepResult.NEXT
    }

    if (context.vendorNewOrderId) {
      context.vendorNewOrder = await runtime.vendor.getOrder(customerId, context.vendorNewOrderId)
    } else {
      const preview = context.vendorPreviewOrder
      if (!preview) {
        return StepResult.NEXT
      }

      try {
        context.vendorNewOrder = await runtime.vendor.createNewOrder(customerId, preview)
      } catch (error) {
        if (!isVendorApiError(error)) {
          throw error
        }

        await switchOrderToFailed(
          runtime,
          context,
          formatOrderError(ERR_VENDOR_ERROR, { details: error.message })
        )
        return StepResult.HALT
      }

      await saveVendorOrderId(runtime, context, context.vendorNewOrder.orderId)
    }

    return checkVendorStatus(runtime, context, context.vendorNewOrder.status)
  }
}

export class RefreshCustomer implements Step {
  readonly name = "RefreshCustomer"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    if (context.vendorCustomerId) {
      context.vendorCustomer = await runtime.vendor.getCustomer(context.vendorCustomerId)
    }

    return StepResult.NEXT
  }
}

export class CompleteOrder implements Step {
  readonly name = "CompleteOrder"
  private readonly templateName: string | ((context: FulfillmentContext) => string)

  constructor(templateName: string | ((context: FulfillmentContext) => string)) {
    this.templateName = templateName
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const templateName =
      typeof this.templateName === "function" ? this.templateName(context) : this.templateName
    await switchOrderToCompleted(runtime, context, templateName)
    return StepResult.NEXT
  }
}
