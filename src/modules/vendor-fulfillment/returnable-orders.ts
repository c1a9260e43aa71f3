import {
  type ReturnableOrderInfo,
  type VendorOrder,
  VendorStatus,
} from "../../integrations/vendor/types"
import { logStructured } from "../logging/structured-logger"
import { LAST_TWO_WEEKS_DAYS } from "./constants"
import type { FulfillmentContext, ValidationMode } from "./context"
import { checkVendorStatus, waitForVendor } from "./due-date"
import { ERR_NO_RETURNABLE_ORDERS, type OrderErrorDefinition, formatOrderError } from "./order-errors"
import { lineSku } from "./lines"
import { reportOrderError } from "./order-status"
import { getCotermDate } from "./parameters"
import { type Step, StepResult } from "./pipeline"
import { type FulfillmentRuntime, addDaysIso, todayIso } from "./runtime"

export type ReturnableMatch =
  | { matched: true; orders: ReturnableOrderInfo[] }
  | { matched: false; reason: "no_subset" | "too_many_candidates" }

function sumQuantities(orders: readonly ReturnableOrderInfo[]): number {
  return orders.reduce((total, info) => total + info.quantity, 0)
}

/** Index combinations of size `k` out of `n`, in lexicographic order. */
function* combinations(n: number, k: number): Generator<number[]> {
  const indexes = Array.from({ length: k }, (_, position) => position)

  while (true) {
    yield [...indexes]

    let position = k - 1
    while (position >= 0 && indexes[position] === n - k + position) {
      position -= 1
    }
    if (position < 0) {
      return
    }

    indexes[position] += 1
    for (let next = position + 1; next < k; next += 1) {
      indexes[next] = indexes[next - 1] + 1
    }
  }
}

/**
 * Finds the returnable orders whose quantities add up to exactly `delta`.
 * Subsets are tried from the largest size down, so on equal sums the subset
 * with more orders wins; within one size the first combination in candidate
 * order wins.
 *
 * The search is exponential in the number of candidates. Above
 * `maxCandidates` only the full set and single orders are tried.
 */
export function matchReturnableOrders(
  candidates: readonly ReturnableOrderInfo[],
  delta: number,
  options: { maxCandidates: number }
): ReturnableMatch {
  if (delta <= 0) {
    return { matched: true, orders: [] }
  }

  const n = candidates.length
  if (n > options.maxCandidates) {
    if (sumQuantities(candidates) === delta) {
      return { matched: true, orders: [...candidates] }
    }

    const single = candidates.find((info) => info.quantity === delta)
    return single
      ? { matched: true, orders: [single] }
      : { matched: false, reason: "too_many_candidates" }
  }

  for (let size = n; size > 0; size -= 1) {
    for (const indexes of combinations(n, size)) {
      const subset = indexes.map((index) => candidates[index])
      if (sumQuantities(subset) === delta) {
        return { matched: true, orders: subset }
      }
    }
  }

  return { matched: false, reason: "no_subset" }
}

export function returnOrderQuantity(orders: readonly VendorOrder[]): number {
  return orders.reduce(
    (total, order) =>
      total + order.lineItems.reduce((lineTotal, line) => lineTotal + line.quantity, 0),
    0
  )
}

/** Drops candidates an in-flight return already cancels. */
export function excludeReturnedCandidates(
  candidates: readonly ReturnableOrderInfo[],
  returnOrders: readonly VendorOrder[]
): ReturnableOrderInfo[] {
  const returned = new Set(
    returnOrders.map((order) => order.referenceOrderId).filter((id): id is string => Boolean(id))
  )
  return candidates.filter((info) => !returned.has(info.order.orderId))
}

export function isWithinLastTwoWeeks(runtime: FulfillmentRuntime, cotermDate: string): boolean {
  return todayIso(runtime) >= addDaysIso(cotermDate.slice(0, 10), -LAST_TWO_WEEKS_DAYS)
}

function resolveCotermDate(context: FulfillmentContext): string | undefined {
  return context.vendorCustomer?.cotermDate ?? getCotermDate(context.order)
}

export class GetReturnOrders implements Step {
  readonly name = "GetReturnOrders"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    if (context.vendorCustomerId) {
      context.vendorReturnOrders = await runtime.vendor.getReturnOrdersByExternalReference(
        context.vendorCustomerId,
        context.orderId
      )
    }

    return StepResult.NEXT
  }
}

/**
 * For every downsized line, finds the vendor orders still inside their
 * cancellation window that add up to the part of the delta not already
 * covered by in-flight returns.
 */
export class GetReturnableOrders implements Step {
  readonly name = "GetReturnableOrders"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    const cotermDate = resolveCotermDate(context)
    if (!customerId || !cotermDate || !context.downsizeLines.length) {
      return StepResult.NEXT
    }

    if (isWithinLastTwoWeeks(runtime, cotermDate)) {
      logStructured(runtime.logger, "info", "returnable_orders.skipped", {
        order_id: context.orderId,
        meta: { reason: "within_last_two_weeks", coterm_date: cotermDate },
      })
      return StepResult.NEXT
    }

    for (const line of context.downsizeLines) {
      const sku = lineSku(line)
      const inFlight = context.vendorReturnOrders[sku] ?? []
      const delta = line.oldQuantity - line.quantity - returnOrderQuantity(inFlight)

      if (delta <= 0) {
        context.vendorReturnableOrders[sku] = []
        continue
      }

      const candidates = excludeReturnedCandidates(
        await runtime.vendor.getReturnableOrdersBySku(customerId, sku, cotermDate),
        inFlight
      )
      const match = matchReturnableOrders(candidates, delta, {
        maxCandidates: runtime.config.maxReturnableCandidates,
      })

      if (match.matched) {
        context.vendorReturnableOrders[sku] = match.orders
        continue
      }

      context.vendorReturnableOrders[sku] = null
      const level = match.reason === "too_many_candidates" ? "warn" : "info"
      logStructured(runtime.logger, level, "returnable_orders.unmatched", {
        order_id: context.orderId,
        meta: { sku, delta, candidates: candidates.length, reason: match.reason },
      })
    }

    return StepResult.NEXT
  }
}

export function findUnmatchedSkus(context: FulfillmentContext): string[] {
  return Object.entries(context.vendorReturnableOrders)
    .filter(([sku, orders]) => orders === null && !(context.vendorReturnOrders[sku]?.length))
    .map(([sku]) => sku)
}

export class ValidateReturnableOrders implements Step {
  readonly name = "ValidateReturnableOrders"
  private readonly mode: ValidationMode
  private readonly error: OrderErrorDefinition

  constructor(mode: ValidationMode = "enforcing", error: OrderErrorDefinition = ERR_NO_RETURNABLE_ORDERS) {
    this.mode = mode
    this.error = error
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const unmatched = findUnmatchedSkus(context)
    if (!unmatched.length) {
      return StepResult.NEXT
    }

    return reportOrderError(
      runtime,
      context,
      this.mode,
      formatOrderError(this.error, { non_returnable_skus: unmatched.join(", ") })
    )
  }
}

/**
 * Places one RETURN order per matched returnable order and waits until every
 * return, new or already in flight, is processed by the vendor.
 */
export class SubmitReturnOrders implements Step {
  readonly name = "SubmitReturnOrders"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const customerId = context.vendorCustomerId
    if (!customerId) {
      return StepResult.NEXT
    }

    const created: VendorOrder[] = []
    for (const [sku, infos] of Object.entries(context.vendorReturnableOrders)) {
      const inFlight = context.vendorReturnOrders[sku] ?? []
      for (const info of infos ?? []) {
        if (inFlight.some((order) => order.referenceOrderId === info.order.orderId)) {
          continue
        }

        created.push(
          await runtime.vendor.createReturnOrder({
            customerId,
            orderId: context.orderId,
            currency: context.currency,
            returningOrder: info.order,
            returningLine: info.line,
          })
        )
      }
    }

    if (created.length) {
      logStructured(runtime.logger, "info", "return_orders.created", {
        order_id: context.orderId,
        meta: { return_order_ids: created.map((order) => order.orderId) },
      })
    }

    const allReturns = [...created, ...Object.values(context.vendorReturnOrders).flat()]
    const failed = allReturns.find(
      (order) => order.status !== VendorStatus.PENDING && order.status !== VendorStatus.PROCESSED
    )
    if (failed) {
      return checkVendorStatus(runtime, context, failed.status)
    }

    if (allReturns.some((order) => order.status === VendorStatus.PENDING)) {
      return waitForVendor(runtime, context)
    }

    return StepResult.NEXT
  }
}
