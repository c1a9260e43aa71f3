import {
  type VendorApiError,
  type VendorHttpError,
  isVendorApiError,
  isVendorHttpError,
} from "../../../integrations/vendor/errors"
import type { OrderLine } from "../../../integrations/marketplace/types"
import {
  ResellerChangeAction,
  type TransferPreview,
  UNRECOVERABLE_TRANSFER_STATUS_DESCRIPTIONS,
  type VendorTransfer,
  VendorStatus,
  toBaseSku,
} from "../../../integrations/vendor/types"
import { logStructured } from "../../logging/structured-logger"
import { FulfillmentParam, OrderingParam } from "../constants"
import type { FulfillmentContext, ValidationMode } from "../context"
import { checkVendorStatus } from "../due-date"
import { findLineBySku, lineSku } from "../lines"
import {
  ERR_CUSTOMER_DATA_MISSING,
  ERR_ITEM_NOT_IN_CATALOG,
  ERR_MEMBERSHIP_EMPTY,
  ERR_MEMBERSHIP_ID,
  ERR_MEMBERSHIP_ITEMS_DONT_MATCH,
  ERR_RESELLER_CHANGE,
  ERR_RESELLER_CHANGE_PREVIEW,
  ERR_TRANSFER_PREVIEW,
  ERR_VENDOR_ERROR,
  formatOrderError,
} from "../order-errors"
import {
  persistParameters,
  reportParameterError,
  saveVendorOrderId,
  switchOrderToFailed,
} from "../order-status"
import { getCustomerIdParameter, getOrderingText, setFulfillmentValue } from "../parameters"
import { type Step, StepResult } from "../pipeline"
import { type FulfillmentRuntime, todayIso } from "../runtime"
import { createMarketplaceSubscription } from "./subscriptions"

const MEMBERSHIP_NOT_FOUND_CODES: ReadonlySet<string> = new Set([
  VendorStatus.TRANSFER_INVALID_MEMBERSHIP,
  VendorStatus.TRANSFER_INVALID_MEMBERSHIP_OR_TRANSFER_IDS,
])

function isMembershipNotFound(error: unknown): error is VendorApiError | VendorHttpError {
  return (
    (isVendorApiError(error) && MEMBERSHIP_NOT_FOUND_CODES.has(error.code)) ||
    (isVendorHttpError(error) && error.status === 404)
  )
}

export class SetupTransferContext implements Step {
  readonly name = "SetupTransferContext"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "enforcing") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const membershipId = getOrderingText(context.order, OrderingParam.MEMBERSHIP_ID)
    if (!membershipId) {
      return reportParameterError(
        runtime,
        context,
        this.mode,
        OrderingParam.MEMBERSHIP_ID,
        formatOrderError(ERR_CUSTOMER_DATA_MISSING, { title: "membership id" }),
        { required: true }
      )
    }

    context.transfer.membershipId = membershipId
    return StepResult.NEXT
  }
}

function itemKey(sku: string, quantity: number): string {
  return `${sku}:${quantity}`
}

/**
 * Previews the membership, checks its items against the order lines and
 * starts the transfer. Runs once; later runs find the transfer id on the order.
 */
export class ValidateTransfer implements Step {
  readonly name = "ValidateTransfer"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const membershipId = context.transfer.membershipId
    if (context.vendorNewOrderId || !membershipId) {
      return StepResult.NEXT
    }

    let previewItems: Array<{ offerId: string; quantity: number }>
    try {
      previewItems = (await runtime.vendor.previewTransfer(membershipId)).items
    } catch (error) {
      if (isMembershipNotFound(error)) {
        return reportParameterError(
          runtime,
          context,
          "enforcing",
          OrderingParam.MEMBERSHIP_ID,
          formatOrderError(ERR_MEMBERSHIP_ID, { membership_id: membershipId, error: error.message })
        )
      }
      if (!isVendorApiError(error)) {
        throw error
      }

      await switchOrderToFailed(
        runtime,
        context,
        formatOrderError(ERR_TRANSFER_PREVIEW, { error: error.message })
      )
      return StepResult.HALT
    }

    const membershipItems = previewItems
      .map((item) => itemKey(toBaseSku(item.offerId), item.quantity))
      .sort()
    const orderItems = context.order.lines
      .filter((line) => line.quantity > 0)
      .map((line) => itemKey(lineSku(line), line.quantity))
      .sort()

    if (membershipItems.join(",") !== orderItems.join(",")) {
      return reportParameterError(
        runtime,
        context,
        "enforcing",
        OrderingParam.MEMBERSHIP_ID,
        formatOrderError(ERR_MEMBERSHIP_ITEMS_DONT_MATCH, { line_skus: membershipItems.join(", ") })
      )
    }

    let transfer: VendorTransfer
    try {
      transfer = await runtime.vendor.createTransfer(context.orderId, membershipId)
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

    context.transfer.vendorTransfer = transfer
    await saveVendorOrderId(runtime, context, transfer.transferId)
    return StepResult.NEXT
  }
}

type VendorItem = { offerId: string; quantity: number }

/**
 * Rewrites the draft lines to the vendor account's items: quantities of
 * known SKUs are replaced, missing SKUs are added from the product catalog
 * at the vendor price and lines the account does not hold are dropped.
 */
async function syncLinesWithVendorItems(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  parameter: OrderingParam,
  vendorItems: readonly VendorItem[]
): Promise<StepResult> {
  const skus = [...new Set(vendorItems.map((item) => toBaseSku(item.offerId)))]
  const catalog = new Map(
    (await runtime.marketplace.getProductItemsBySkus(context.productId, skus)).map((item) => [
      item.externalIds.vendor,
      item,
    ])
  )
  const missing = skus.find((sku) => !catalog.has(sku))
  if (missing) {
    return reportParameterError(
      runtime,
      context,
      "validating",
      parameter,
      formatOrderError(ERR_ITEM_NOT_IN_CATALOG, { sku: missing })
    )
  }

  const prices = await runtime.vendor.getSkuPrices({
    currency: context.currency,
    skus: vendorItems.map((item) => item.offerId),
  })

  const lines = new Map<string, OrderLine>()
  for (const vendorItem of vendorItems) {
    const sku = toBaseSku(vendorItem.offerId)
    const synced = lines.get(sku)
    if (synced) {
      lines.set(sku, { ...synced, quantity: synced.quantity + vendorItem.quantity })
      continue
    }

    const existing = findLineBySku(context.order, sku)
    if (existing) {
      lines.set(sku, { ...existing, quantity: vendorItem.quantity })
      continue
    }

    const item = catalog.get(sku)
    if (item) {
      lines.set(sku, {
        id: "",
        quantity: vendorItem.quantity,
        oldQuantity: 0,
        item: { id: item.id, name: item.name, externalIds: { vendor: sku } },
        price: { unitPP: prices[vendorItem.offerId] ?? 0 },
      })
    }
  }

  context.order = { ...context.order, lines: [...lines.values()] }
  return StepResult.NEXT
}

/** Draft check: previews the membership and mirrors its items onto the order lines. */
export class PreviewTransferLines implements Step {
  readonly name = "PreviewTransferLines"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const membershipId = context.transfer.membershipId
    if (!membershipId) {
      return StepResult.NEXT
    }

    let preview: TransferPreview
    try {
      preview = await runtime.vendor.previewTransfer(membershipId)
    } catch (error) {
      if (isMembershipNotFound(error)) {
        return reportParameterError(
          runtime,
          context,
          "validating",
          OrderingParam.MEMBERSHIP_ID,
          formatOrderError(ERR_MEMBERSHIP_ID, { membership_id: membershipId, error: error.message })
        )
      }
      if (!isVendorApiError(error)) {
        throw error
      }

      return reportParameterError(
        runtime,
        context,
        "validating",
        OrderingParam.MEMBERSHIP_ID,
        formatOrderError(ERR_TRANSFER_PREVIEW, { error: error.message })
      )
    }

    if (!preview.items.length) {
      return reportParameterError(
        runtime,
        context,
        "validating",
        OrderingParam.MEMBERSHIP_ID,
        formatOrderError(ERR_MEMBERSHIP_EMPTY, { membership_id: membershipId })
      )
    }

    return syncLinesWithVendorItems(runtime, context, OrderingParam.MEMBERSHIP_ID, preview.items)
  }
}

export type TransferKind = "membership" | "reseller_change"

/** Polls the vendor transfer until it is processed. */
export class CheckVendorTransfer implements Step {
  readonly name = "CheckVendorTransfer"
  private readonly kind: TransferKind

  constructor(kind: TransferKind) {
    this.kind = kind
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const transferId = context.vendorNewOrderId
    if (!transferId) {
      return StepResult.NEXT
    }

    if (this.kind === "membership") {
      const membershipId = context.transfer.membershipId
      if (!membershipId) {
        return StepResult.NEXT
      }
      context.transfer.vendorTransfer = await runtime.vendor.getTransfer(membershipId, transferId)
    } else {
      context.transfer.vendorTransfer = await runtime.vendor.getResellerTransfer(transferId)
    }

    return checkVendorStatus(runtime, context, context.transfer.vendorTransfer.status, {
      unrecoverable: UNRECOVERABLE_TRANSFER_STATUS_DESCRIPTIONS,
    })
  }
}

/** Links the transferred customer to the order and the agreement. */
export class GetTransferCustomer implements Step {
  readonly name = "GetTransferCustomer"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.transfer.vendorTransfer?.customerId ?? context.vendorCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    context.vendorCustomerId = customerId
    if (getCustomerIdParameter(context.order) !== customerId) {
      context.order = setFulfillmentValue(context.order, FulfillmentParam.CUSTOMER_ID, customerId)
      await persistParameters(runtime, context)
    }
    if (context.order.agreement.externalIds.vendor !== customerId) {
      await runtime.marketplace.updateAgreement(context.agreementId, {
        externalIds: { vendor: customerId },
      })
    }

    context.vendorCustomer = await runtime.vendor.getCustomer(customerId)
    return StepResult.NEXT
  }
}

/** Mirrors the customer's processed vendor subscriptions onto the order lines. */
export class CreateTransferSubscriptions implements Step {
  readonly name = "CreateTransferSubscriptions"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    const subscriptions = await runtime.vendor.getSubscriptions(customerId)
    for (const subscription of subscriptions) {
      if (subscription.status !== VendorStatus.PROCESSED) {
        continue
      }

      const line = findLineBySku(context.order, subscription.offerId)
      if (!line) {
        continue
      }

      const existing = await runtime.marketplace.getOrderSubscriptionByExternalId(
        context.orderId,
        subscription.subscriptionId
      )
      if (!existing) {
        await createMarketplaceSubscription(runtime, context, subscription, line)
      }
    }

    return StepResult.NEXT
  }
}

export class SetupResellerChangeContext implements Step {
  readonly name = "SetupResellerChangeContext"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "enforcing") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const approvalCode = getOrderingText(context.order, OrderingParam.RESELLER_CHANGE_CODE)
    const adminEmail = getOrderingText(context.order, OrderingParam.RESELLER_CHANGE_ADMIN_EMAIL)

    if (!approvalCode) {
      return reportParameterError(
        runtime,
        context,
        this.mode,
        OrderingParam.RESELLER_CHANGE_CODE,
        formatOrderError(ERR_CUSTOMER_DATA_MISSING, { title: "reseller change code" }),
        { required: true }
      )
    }
    if (!adminEmail) {
      return reportParameterError(
        runtime,
        context,
        this.mode,
        OrderingParam.RESELLER_CHANGE_ADMIN_EMAIL,
        formatOrderError(ERR_CUSTOMER_DATA_MISSING, { title: "administrator email" }),
        { required: true }
      )
    }

    context.transfer.approvalCode = approvalCode
    context.transfer.adminEmail = adminEmail
    return StepResult.NEXT
  }
}

export class CommitResellerChange implements Step {
  readonly name = "CommitResellerChange"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const { approvalCode, adminEmail } = context.transfer
    if (context.vendorNewOrderId || !approvalCode || !adminEmail) {
      return StepResult.NEXT
    }

    let transfer: VendorTransfer
    try {
      transfer = await runtime.vendor.resellerChangeRequest({
        action: ResellerChangeAction.COMMIT,
        orderId: context.orderId,
        approvalCode,
        adminEmail,
        resellerId: runtime.config.vendor.resellerId ?? context.sellerId,
      })
    } catch (error) {
      if (!isVendorApiError(error)) {
        throw error
      }

      await switchOrderToFailed(
        runtime,
        context,
        formatOrderError(ERR_RESELLER_CHANGE, { error: error.message })
      )
      return StepResult.HALT
    }

    context.transfer.vendorTransfer = transfer
    await saveVendorOrderId(runtime, context, transfer.transferId)
    return StepResult.NEXT
  }
}

/** Draft check: previews the reseller change and lists the account's items as lines. */
export class PreviewResellerChange implements Step {
  readonly name = "PreviewResellerChange"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const { approvalCode, adminEmail } = context.transfer
    if (!approvalCode || !adminEmail) {
      return StepResult.NEXT
    }

    let preview: VendorTransfer
    try {
      preview = await runtime.vendor.resellerChangeRequest({
        action: ResellerChangeAction.PREVIEW,
        orderId: context.orderId,
        approvalCode,
        adminEmail,
        resellerId: runtime.config.vendor.resellerId ?? context.sellerId,
      })
    } catch (error) {
      if (!isVendorApiError(error)) {
        throw error
      }

      return reportParameterError(
        runtime,
        context,
        "validating",
        OrderingParam.RESELLER_CHANGE_CODE,
        formatOrderError(ERR_RESELLER_CHANGE_PREVIEW, { code: approvalCode, error: error.message })
      )
    }

    const expiry = preview.approval?.expiry
    if (expiry && expiry.slice(0, 10) < todayIso(runtime)) {
      return reportParameterError(
        runtime,
        context,
        "validating",
        OrderingParam.RESELLER_CHANGE_CODE,
        formatOrderError(ERR_RESELLER_CHANGE_PREVIEW, {
          code: approvalCode,
          error: `the code expired on ${expiry.slice(0, 10)}`,
        })
      )
    }
    if (!preview.lineItems.length) {
      return reportParameterError(
        runtime,
        context,
        "validating",
        OrderingParam.RESELLER_CHANGE_CODE,
        formatOrderError(ERR_RESELLER_CHANGE_PREVIEW, {
          code: approvalCode,
          error: "the account has no subscriptions to transfer",
        })
      )
    }

    return syncLinesWithVendorItems(runtime, context, OrderingParam.RESELLER_CHANGE_CODE, preview.lineItems)
  }
}

/**
 * Transferred subscriptions arrive with auto-renewal off. Failures are
 * logged and left for operations; the transfer itself already happened.
 */
export class EnableAutoRenewal implements Step {
  readonly name = "EnableAutoRenewal"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    const subscriptions = await runtime.vendor.getSubscriptions(customerId)
    for (const subscription of subscriptions) {
      if (subscription.status !== VendorStatus.PROCESSED || subscription.autoRenewal.enabled) {
        continue
      }

      try {
        await runtime.vendor.updateSubscription(customerId, subscription.subscriptionId, {
          autoRenewal: true,
        })
      } catch (error) {
        if (!isVendorApiError(error)) {
          throw error
        }

        logStructured(runtime.logger, "warn", "subscription.auto_renewal_not_enabled", {
          order_id: context.orderId,
          meta: { subscription_id: subscription.subscriptionId, error: error.message },
        })
      }
    }

    return StepResult.NEXT
  }
}
