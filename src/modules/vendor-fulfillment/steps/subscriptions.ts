import type { OrderLine } from "../../../integrations/marketplace/types"
import { type VendorApiError, isVendorApiError, isVendorHttpError } from "../../../integrations/vendor/errors"
import {
  type SubscriptionUpdate,
  type VendorSubscription,
  VendorStatus,
  toBaseSku,
} from "../../../integrations/vendor/types"
import { logStructured } from "../../logging/structured-logger"
import { toAppError } from "../../observability/errors"
import { FulfillmentParam, TemplateName } from "../constants"
import type { FulfillmentContext } from "../context"
import { findLineBySku, findLineSubscription, lineSku } from "../lines"
import { ERR_INVALID_RENEWAL_STATE, ERR_SUBSCRIPTION_UPDATE, formatOrderError } from "../order-errors"
import { switchOrderToFailed } from "../order-status"
import { type Step, StepResult } from "../pipeline"
import type { FulfillmentRuntime } from "../runtime"

/** Creates the marketplace subscription mirroring a processed vendor subscription. */
export async function createMarketplaceSubscription(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  subscription: VendorSubscription,
  line: OrderLine
): Promise<void> {
  const created = await runtime.marketplace.createSubscription(context.orderId, {
    name: `Subscription for ${line.item.name}`,
    parameters: {
      fulfillment: [{ externalId: FulfillmentParam.VENDOR_SKU, value: subscription.offerId }],
    },
    externalIds: { vendor: subscription.subscriptionId },
    lines: [{ id: line.id }],
    startDate: subscription.creationDate,
    commitmentDate: subscription.renewalDate,
    autoRenew: subscription.autoRenewal.enabled,
  })

  logStructured(runtime.logger, "info", "subscription.created", {
    order_id: context.orderId,
    meta: {
      subscription_id: created.id,
      vendor_subscription_id: subscription.subscriptionId,
      offer_id: subscription.offerId,
    },
  })
}

/**
 * Mirrors every subscription of the processed NEW order into the marketplace.
 * Existing subscriptions (upsizes) only get their vendor SKU refreshed.
 */
export class CreateOrUpdateSubscriptions implements Step {
  readonly name = "CreateOrUpdateSubscriptions"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    const vendorOrder = context.vendorNewOrder
    if (!customerId || vendorOrder?.status !== VendorStatus.PROCESSED) {
      return StepResult.NEXT
    }

    for (const item of vendorOrder.lineItems) {
      if (!item.subscriptionId) {
        continue
      }

      const subscription = await runtime.vendor.getSubscription(customerId, item.subscriptionId)
      if (subscription.status !== VendorStatus.PROCESSED) {
        continue
      }

      const existing = await runtime.marketplace.getOrderSubscriptionByExternalId(
        context.orderId,
        subscription.subscriptionId
      )
      if (existing) {
        await runtime.marketplace.updateSubscription(context.orderId, existing.id, {
          parameters: {
            fulfillment: [{ externalId: FulfillmentParam.VENDOR_SKU, value: subscription.offerId }],
          },
        })
        continue
      }

      const line = findLineBySku(context.order, item.offerId)
      if (line) {
        await createMarketplaceSubscription(runtime, context, subscription, line)
      }
    }

    return StepResult.NEXT
  }
}

type RollbackOutcome = { subscriptionId: string; error?: string }

async function rollbackUpdatedSubscriptions(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  customerId: string
): Promise<RollbackOutcome[]> {
  const outcomes: RollbackOutcome[] = []
  for (const updated of [...context.updatedSubscriptions].reverse()) {
    try {
      await runtime.vendor.updateSubscription(customerId, updated.subscriptionId, {
        quantity: updated.previousQuantity,
        autoRenewal: updated.previousAutoRenewal,
      })
      outcomes.push({ subscriptionId: updated.subscriptionId })
    } catch (error) {
      if (!isVendorApiError(error) && !isVendorHttpError(error)) {
        throw error
      }

      logStructured(runtime.logger, "error", "subscription.rollback_failed", {
        order_id: context.orderId,
        meta: { subscription_id: updated.subscriptionId, error: error.message },
      })
      outcomes.push({ subscriptionId: updated.subscriptionId, error: error.message })
    }
  }

  context.updatedSubscriptions = []
  return outcomes
}

/**
 * Restores the subscriptions already changed in this run, tells operations
 * which ones were touched and fails the order.
 */
async function failSubscriptionUpdate(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  customerId: string,
  subscriptionId: string,
  error: VendorApiError
): Promise<StepResult> {
  const rolledBack = await rollbackUpdatedSubscriptions(runtime, context, customerId)
  try {
    await runtime.notifier.notifyNotUpdatedSubscriptions({
      orderId: context.orderId,
      productId: context.productId,
      errorMessage: error.message,
      subscriptions: [{ subscriptionId, error: error.message }, ...rolledBack],
    })
  } catch (notifyError) {
    const failure = toAppError(notifyError)
    logStructured(runtime.logger, "warn", "notification.failed", {
      order_id: context.orderId,
      error_code: failure.code,
      meta: { message: failure.message, subscriptions: rolledBack.length },
    })
  }

  const orderError =
    error.code === VendorStatus.INVALID_RENEWAL_STATE
      ? formatOrderError(ERR_INVALID_RENEWAL_STATE, { error: error.message })
      : formatOrderError(ERR_SUBSCRIPTION_UPDATE, { error: error.message })
  await switchOrderToFailed(runtime, context, orderError)
  return StepResult.HALT
}

type UpdateAttempt = { ok: true } | { ok: false; error: VendorApiError }

async function updateVendorSubscription(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  customerId: string,
  subscription: VendorSubscription,
  update: SubscriptionUpdate
): Promise<UpdateAttempt> {
  try {
    await runtime.vendor.updateSubscription(customerId, subscription.subscriptionId, update)
  } catch (error) {
    if (!isVendorApiError(error)) {
      throw error
    }
    return { ok: false, error }
  }

  context.updatedSubscriptions.push({
    subscriptionId: subscription.subscriptionId,
    previousQuantity: subscription.autoRenewal.renewalQuantity,
    previousAutoRenewal: subscription.autoRenewal.enabled,
  })
  logStructured(runtime.logger, "info", "subscription.updated", {
    order_id: context.orderId,
    meta: { subscription_id: subscription.subscriptionId, ...update },
  })
  return { ok: true }
}

/**
 * An upsize whose seats the processed NEW order already added may be refused
 * with "invalid renewal state"; the renewal then already holds the seats.
 */
function isCoveredByNewOrder(context: FulfillmentContext, line: OrderLine): boolean {
  const vendorOrder = context.vendorNewOrder
  if (line.oldQuantity >= line.quantity || vendorOrder?.status !== VendorStatus.PROCESSED) {
    return false
  }

  const sku = lineSku(line)
  return vendorOrder.lineItems.some((item) => toBaseSku(item.offerId) === sku)
}

/** Aligns each changed subscription's renewal quantity with the line's new quantity. */
export class UpdateRenewalQuantities implements Step {
  readonly name = "UpdateRenewalQuantities"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    const lines = [...context.upsizeLines, ...context.newLines, ...context.downsizeLines]
    for (const line of lines) {
      const subscriptionId = findLineSubscription(context.order, line)?.externalIds.vendor
      if (!subscriptionId) {
        continue
      }

      const subscription = await runtime.vendor.getSubscription(customerId, subscriptionId)
      if (subscription.autoRenewal.renewalQuantity === line.quantity) {
        continue
      }

      const attempt = await updateVendorSubscription(runtime, context, customerId, subscription, {
        quantity: line.quantity,
      })
      if (attempt.ok) {
        continue
      }

      if (
        attempt.error.code === VendorStatus.INVALID_RENEWAL_STATE &&
        isCoveredByNewOrder(context, line)
      ) {
        logStructured(runtime.logger, "info", "subscription.renewal_update_skipped", {
          order_id: context.orderId,
          meta: { subscription_id: subscriptionId, reason: attempt.error.message },
        })
        continue
      }

      return failSubscriptionUpdate(runtime, context, customerId, subscriptionId, attempt.error)
    }

    return StepResult.NEXT
  }
}

/**
 * Terminated lines that could not be cancelled through returns stop renewing
 * at the anniversary date instead.
 */
export class SwitchAutoRenewalOff implements Step {
  readonly name = "SwitchAutoRenewalOff"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    for (const line of context.downsizeLines) {
      const sku = lineSku(line)
      if (context.vendorReturnableOrders[sku] || context.vendorReturnOrders[sku]?.length) {
        continue
      }

      const subscriptionId = findLineSubscription(context.order, line)?.externalIds.vendor
      if (!subscriptionId) {
        continue
      }

      const subscription = await runtime.vendor.getSubscription(customerId, subscriptionId)
      if (!subscription.autoRenewal.enabled) {
        continue
      }

      const attempt = await updateVendorSubscription(runtime, context, customerId, subscription, {
        autoRenewal: false,
      })
      if (!attempt.ok) {
        return failSubscriptionUpdate(runtime, context, customerId, subscriptionId, attempt.error)
      }
    }

    return StepResult.NEXT
  }
}

/** Applies the auto-renewal flag (and renewal quantity) a configuration order asks for. */
export class SubscriptionUpdateAutoRenewal implements Step {
  readonly name = "SubscriptionUpdateAutoRenewal"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    for (const orderSubscription of context.order.subscriptions) {
      const subscriptionId = orderSubscription.externalIds.vendor
      if (orderSubscription.autoRenew === undefined || !subscriptionId) {
        continue
      }

      const subscription = await runtime.vendor.getSubscription(customerId, subscriptionId)
      const quantity = orderSubscription.lines[0]?.quantity ?? subscription.currentQuantity
      if (
        subscription.autoRenewal.enabled === orderSubscription.autoRenew &&
        subscription.autoRenewal.renewalQuantity === quantity
      ) {
        continue
      }

      const attempt = await updateVendorSubscription(runtime, context, customerId, subscription, {
        autoRenewal: orderSubscription.autoRenew,
        quantity,
      })
      if (!attempt.ok) {
        return failSubscriptionUpdate(runtime, context, customerId, subscriptionId, attempt.error)
      }
    }

    return StepResult.NEXT
  }
}

export function autoRenewalTemplate(context: FulfillmentContext): string {
  const requested = context.order.subscriptions.filter(
    (subscription) => subscription.autoRenew !== undefined
  )
  return requested.length && requested.every((subscription) => subscription.autoRenew)
    ? TemplateName.AUTO_RENEWAL_ENABLED
    : TemplateName.AUTO_RENEWAL_DISABLED
}
