import type { OrderError, OrderLine } from "../../integrations/marketplace/types"
import {
  CommitmentStatus,
  OfferType,
  type VendorCommitment,
  type VendorCustomer,
  type VendorSubscription,
  VendorStatus,
  offerTypeOf,
  toBaseSku,
} from "../../integrations/vendor/types"
import { logStructured } from "../logging/structured-logger"
import {
  COMMITMENT_BENEFIT_TYPE,
  MIN_COMMITMENT_CONSUMABLES,
  MIN_COMMITMENT_LICENSES,
  OrderingParam,
} from "./constants"
import {
  type FulfillmentContext,
  OrderType,
  type ValidationMode,
  getCustomerData,
} from "./context"
import {
  ERR_COMMITMENT_BLOCKED,
  ERR_COMMITMENT_BOTH,
  ERR_COMMITMENT_CONSUMABLES,
  ERR_COMMITMENT_LICENSES,
  ERR_COMMITMENT_MINIMUM_REQUEST,
  ERR_COMMITMENT_NO_MINIMUMS,
  formatOrderError,
} from "./order-errors"
import { lineSku } from "./lines"
import { reportOrderError, reportParameterError } from "./order-status"
import { getCotermDate } from "./parameters"
import { type Step, StepResult } from "./pipeline"
import type { FulfillmentRuntime } from "./runtime"

export type CommitmentQuantities = {
  licenses: number
  consumables: number
}

type QuantityShortfall = { selected: number; minimum: number }

export type CommitmentVerdict =
  | { kind: "skip"; reason: "no_commitment" | "ends_before_coterm" }
  | { kind: "status_blocked"; status: string }
  | { kind: "below_minimum"; licenses?: QuantityShortfall; consumables?: QuantityShortfall }
  | { kind: "ok" }

const BLOCKING_STATUSES: ReadonlySet<string> = new Set([
  CommitmentStatus.EXPIRED,
  CommitmentStatus.NONCOMPLIANT,
  CommitmentStatus.DECLINED,
])

export function getCommitment(customer: VendorCustomer | undefined): VendorCommitment | undefined {
  return customer?.benefits.find((benefit) => benefit.type === COMMITMENT_BENEFIT_TYPE)?.commitment
}

export function getCommitmentRequest(
  customer: VendorCustomer | undefined
): VendorCommitment | undefined {
  return customer?.benefits.find((benefit) => benefit.type === COMMITMENT_BENEFIT_TYPE)
    ?.commitmentRequest
}

function minimumFor(commitment: VendorCommitment, offerType: OfferType): number | undefined {
  return commitment.minimumQuantities.find((entry) => entry.offerType === offerType)?.quantity
}

/**
 * Order items usually carry only the base SKU, so a line takes the category
 * of the account's subscription for that SKU when there is one.
 */
function lineCategory(line: OrderLine, known: ReadonlyMap<string, OfferType>): OfferType {
  return line.item.offerType ?? known.get(lineSku(line)) ?? offerTypeOf(line.item.externalIds.vendor)
}

/**
 * Quantities the account would hold after the order: active auto-renewing
 * subscriptions minus downsizes, plus upsizes and new lines.
 */
export function computeCommitmentQuantities(
  subscriptions: readonly VendorSubscription[],
  lines: {
    downsizeLines: readonly OrderLine[]
    upsizeLines: readonly OrderLine[]
    newLines: readonly OrderLine[]
  }
): CommitmentQuantities {
  const quantities: CommitmentQuantities = { licenses: 0, consumables: 0 }
  const add = (offerType: OfferType, quantity: number) => {
    if (offerType === OfferType.CONSUMABLES) {
      quantities.consumables += quantity
    } else {
      quantities.licenses += quantity
    }
  }

  const known = new Map<string, OfferType>()
  for (const subscription of subscriptions) {
    const offerType = offerTypeOf(subscription.offerId)
    known.set(toBaseSku(subscription.offerId), offerType)
    if (subscription.status === VendorStatus.PROCESSED && subscription.autoRenewal.enabled) {
      add(offerType, subscription.autoRenewal.renewalQuantity)
    }
  }

  for (const line of lines.downsizeLines) {
    add(lineCategory(line, known), line.quantity - line.oldQuantity)
  }
  for (const line of lines.upsizeLines) {
    add(lineCategory(line, known), line.quantity - line.oldQuantity)
  }
  for (const line of lines.newLines) {
    add(lineCategory(line, known), line.quantity)
  }

  return quantities
}

export function evaluateCommitment(input: {
  commitment?: VendorCommitment
  cotermDate?: string
  quantities: CommitmentQuantities
}): CommitmentVerdict {
  const { commitment, cotermDate, quantities } = input
  if (!commitment) {
    return { kind: "skip", reason: "no_commitment" }
  }

  // the commitment lapses before the next renewal
  if (cotermDate && commitment.endDate && commitment.endDate < cotermDate) {
    return { kind: "skip", reason: "ends_before_coterm" }
  }

  if (BLOCKING_STATUSES.has(commitment.status)) {
    return { kind: "status_blocked", status: commitment.status }
  }

  const minLicenses = minimumFor(commitment, OfferType.LICENSE)
  const minConsumables = minimumFor(commitment, OfferType.CONSUMABLES)
  const licenses =
    minLicenses !== undefined && quantities.licenses < minLicenses
      ? { selected: quantities.licenses, minimum: minLicenses }
      : undefined
  const consumables =
    minConsumables !== undefined && quantities.consumables < minConsumables
      ? { selected: quantities.consumables, minimum: minConsumables }
      : undefined

  if (licenses || consumables) {
    return { kind: "below_minimum", licenses, consumables }
  }

  return { kind: "ok" }
}

export function commitmentVerdictError(verdict: CommitmentVerdict): OrderError | undefined {
  switch (verdict.kind) {
    case "skip":
    case "ok":
      return undefined
    case "status_blocked":
      return formatOrderError(ERR_COMMITMENT_BLOCKED, { status: verdict.status })
    case "below_minimum":
      if (verdict.licenses && verdict.consumables) {
        return formatOrderError(ERR_COMMITMENT_BOTH, {
          minimum_licenses: verdict.licenses.minimum,
          minimum_consumables: verdict.consumables.minimum,
        })
      }
      if (verdict.licenses) {
        return formatOrderError(ERR_COMMITMENT_LICENSES, {
          selected_quantity: verdict.licenses.selected,
          minimum: verdict.licenses.minimum,
        })
      }
      if (verdict.consumables) {
        return formatOrderError(ERR_COMMITMENT_CONSUMABLES, {
          selected_quantity: verdict.consumables.selected,
          minimum: verdict.consumables.minimum,
        })
      }
      return undefined
  }
}

type CommitmentRequestIssue = {
  parameter: OrderingParam
  error: OrderError
}

/** Checks the 3YC minimums a purchase order asks for against its own lines. */
export function checkCommitmentRequest(context: FulfillmentContext): CommitmentRequestIssue | undefined {
  const data = getCustomerData(context.order)
  if (!data.commitmentRequested) {
    return undefined
  }

  const noMinimums = formatOrderError(ERR_COMMITMENT_NO_MINIMUMS, {
    min_licenses: MIN_COMMITMENT_LICENSES,
    min_consumables: MIN_COMMITMENT_CONSUMABLES,
  })

  if (data.commitmentLicenses === undefined && data.commitmentConsumables === undefined) {
    return { parameter: OrderingParam.COMMITMENT, error: noMinimums }
  }
  if (data.commitmentLicenses !== undefined && data.commitmentLicenses < MIN_COMMITMENT_LICENSES) {
    return { parameter: OrderingParam.COMMITMENT_LICENSES, error: noMinimums }
  }
  if (
    data.commitmentConsumables !== undefined &&
    data.commitmentConsumables < MIN_COMMITMENT_CONSUMABLES
  ) {
    return { parameter: OrderingParam.COMMITMENT_CONSUMABLES, error: noMinimums }
  }

  const ordered = computeCommitmentQuantities([], context)
  if (data.commitmentLicenses !== undefined && ordered.licenses < data.commitmentLicenses) {
    return {
      parameter: OrderingParam.COMMITMENT_LICENSES,
      error: formatOrderError(ERR_COMMITMENT_MINIMUM_REQUEST, {
        category: "licenses",
        selected_quantity: ordered.licenses,
        minimum: data.commitmentLicenses,
      }),
    }
  }
  if (data.commitmentConsumables !== undefined && ordered.consumables < data.commitmentConsumables) {
    return {
      parameter: OrderingParam.COMMITMENT_CONSUMABLES,
      error: formatOrderError(ERR_COMMITMENT_MINIMUM_REQUEST, {
        category: "consumables",
        selected_quantity: ordered.consumables,
        minimum: data.commitmentConsumables,
      }),
    }
  }

  return undefined
}

/**
 * Keeps the account at or above its 3-year-commitment minimums. Purchases
 * validate the requested minimums instead, since no commitment exists yet.
 */
export class Validate3YCCommitment implements Step {
  readonly name = "Validate3YCCommitment"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "enforcing") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    if (context.orderType === OrderType.PURCHASE && !context.vendorCustomer) {
      const issue = checkCommitmentRequest(context)
      return issue
        ? reportParameterError(runtime, context, this.mode, issue.parameter, issue.error)
        : StepResult.NEXT
    }

    const customer = context.vendorCustomer
    const commitment = getCommitment(customer)
    if (!customer || !commitment) {
      return StepResult.NEXT
    }

    const subscriptions = await runtime.vendor.getSubscriptions(customer.customerId)
    const quantities = computeCommitmentQuantities(subscriptions, context)
    const verdict = evaluateCommitment({
      commitment,
      cotermDate: customer.cotermDate ?? getCotermDate(context.order),
      quantities,
    })

    logStructured(runtime.logger, "info", "commitment.evaluated", {
      order_id: context.orderId,
      meta: { verdict: verdict.kind, ...quantities },
    })

    const error = commitmentVerdictError(verdict)
    return error ? reportOrderError(runtime, context, this.mode, error) : StepResult.NEXT
  }
}
