import type { Order, OrderLine, OrderSubscription } from "../../integrations/marketplace/types"
import { toBaseSku } from "../../integrations/vendor/types"

export function lineSku(line: OrderLine): string {
  return toBaseSku(line.item.externalIds.vendor)
}

/** Line ids end in a running number ("ALI-1111-2222-0003" is line 3). */
export function extLineItemNumber(line: OrderLine, fallback: number): number {
  const match = /(\d+)$/.exec(line.id)
  return match ? Number.parseInt(match[1], 10) : fallback
}

export function findLineSubscription(order: Order, line: OrderLine): OrderSubscription | undefined {
  const linked = (subscription: OrderSubscription) =>
    subscription.lines.some(
      (entry) => entry.id === line.id || entry.item?.id === line.item.id
    )

  return order.subscriptions.find(linked) ?? order.agreement.subscriptions.find(linked)
}

export function findLineBySku(order: Order, offerId: string): OrderLine | undefined {
  const sku = toBaseSku(offerId)
  return order.lines.find((line) => lineSku(line) === sku)
}
