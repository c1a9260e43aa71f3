import { CommitmentStatus, toBaseSku } from "../../../integrations/vendor/types"
import { logStructured } from "../../logging/structured-logger"
import { getCommitment } from "../commitment"
import type { FulfillmentContext, ValidationMode } from "../context"
import { lineSku } from "../lines"
import { type Step, StepResult } from "../pipeline"
import { type FulfillmentRuntime, todayIso } from "../runtime"

const PRICED_COMMITMENT_STATUSES: ReadonlySet<string> = new Set([
  CommitmentStatus.COMMITTED,
  CommitmentStatus.ACTIVE,
])

/** Start date of a commitment that still grants 3YC prices today. */
function activeCommitmentStart(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext
): string | undefined {
  const commitment = getCommitment(context.vendorCustomer)
  if (!commitment || !PRICED_COMMITMENT_STATUSES.has(commitment.status)) {
    return undefined
  }

  return commitment.endDate >= todayIso(runtime) ? commitment.startDate : undefined
}

/**
 * Copies vendor unit prices onto the order lines covered by the new (or
 * preview) vendor order. Lines the vendor did not price keep their price.
 */
export class UpdatePrices implements Step {
  readonly name = "UpdatePrices"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "enforcing") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const vendorOrder = context.vendorNewOrder ?? context.vendorPreviewOrder
    if (!vendorOrder?.lineItems.length) {
      return StepResult.NEXT
    }

    const prices = await runtime.vendor.getSkuPrices({
      currency: vendorOrder.currencyCode ?? context.currency,
      skus: vendorOrder.lineItems.map((item) => item.offerId),
      commitmentStartDate: activeCommitmentStart(runtime, context),
    })

    const priceBySku = new Map<string, number>()
    for (const [offerId, price] of Object.entries(prices)) {
      priceBySku.set(toBaseSku(offerId), price)
    }

    const updates: Array<{ id: string; price: { unitPP: number } }> = []
    const lines = context.order.lines.map((line) => {
      const unitPP = priceBySku.get(toBaseSku(lineSku(line)))
      if (unitPP === undefined) {
        return line
      }

      updates.push({ id: line.id, price: { unitPP } })
      return { ...line, price: { ...line.price, unitPP } }
    })

    if (!updates.length) {
      return StepResult.NEXT
    }

    context.order = { ...context.order, lines }
    if (this.mode === "enforcing") {
      await runtime.marketplace.updateOrder(context.orderId, { lines: updates })
    }

    logStructured(runtime.logger, "debug", "order.prices.updated", {
      order_id: context.orderId,
      meta: { lines: updates.length, mode: this.mode },
    })

    return StepResult.NEXT
  }
}
