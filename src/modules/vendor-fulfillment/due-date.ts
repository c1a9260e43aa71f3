import {
  UNRECOVERABLE_ORDER_STATUS_DESCRIPTIONS,
  VendorStatus,
} from "../../integrations/vendor/types"
import { logStructured } from "../logging/structured-logger"
import { FulfillmentParam } from "./constants"
import type { FulfillmentContext } from "./context"
import {
  ERR_DUE_DATE_REACHED,
  ERR_MAX_ATTEMPTS,
  ERR_UNEXPECTED_VENDOR_STATUS,
  ERR_UNRECOVERABLE_VENDOR_STATUS,
  formatOrderError,
} from "./order-errors"
import { persistParameters, switchOrderToFailed } from "./order-status"
import { getDueDate, getRetryCount, setFulfillmentValue } from "./parameters"
import { type Step, StepResult } from "./pipeline"
import { type FulfillmentRuntime, addDaysIso, todayIso } from "./runtime"

/** ISO dates compare correctly as strings. */
export function isDueDateReached(runtime: FulfillmentRuntime, dueDate: string): boolean {
  return todayIso(runtime) > dueDate
}

async function failDueDateReached(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  dueDate: string
): Promise<StepResult> {
  await switchOrderToFailed(
    runtime,
    context,
    formatOrderError(ERR_DUE_DATE_REACHED, { due_date: dueDate })
  )
  return StepResult.HALT
}

/**
 * First run: stamps `today + dueDateDays` on the order. Later runs: fails the
 * order once the deadline has passed, whatever the vendor status is.
 */
export class SetupDueDate implements Step {
  readonly name = "SetupDueDate"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const dueDate = getDueDate(context.order)

    if (!dueDate) {
      const nextDueDate = addDaysIso(todayIso(runtime), runtime.config.dueDateDays)
      context.order = setFulfillmentValue(context.order, FulfillmentParam.DUE_DATE, nextDueDate)
      await persistParameters(runtime, context)
      logStructured(runtime.logger, "info", "order.due_date.set", {
        order_id: context.orderId,
        meta: { due_date: nextDueDate },
      })
      return StepResult.NEXT
    }

    if (isDueDateReached(runtime, dueDate)) {
      return failDueDateReached(runtime, context, dueDate)
    }

    return StepResult.NEXT
  }
}

/**
 * The vendor has not finished yet: record one more attempt and stop. The next
 * externally triggered run picks the order up again.
 */
export async function waitForVendor(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext
): Promise<StepResult> {
  const dueDate = getDueDate(context.order)
  const retryCount = getRetryCount(context.order)

  if (dueDate && isDueDateReached(runtime, dueDate)) {
    return failDueDateReached(runtime, context, dueDate)
  }

  if (!dueDate && retryCount >= runtime.config.maxRetryAttempts) {
    await switchOrderToFailed(
      runtime,
      context,
      formatOrderError(ERR_MAX_ATTEMPTS, { max_attempts: runtime.config.maxRetryAttempts })
    )
    return StepResult.HALT
  }

  context.order = setFulfillmentValue(
    context.order,
    FulfillmentParam.RETRY_COUNT,
    String(retryCount + 1)
  )
  await persistParameters(runtime, context)
  logStructured(runtime.logger, "info", "order.vendor.pending", {
    order_id: context.orderId,
    meta: { retry_count: retryCount + 1, due_date: dueDate ?? null },
  })

  return StepResult.HALT
}

export type VendorStatusCheckOptions = {
  unrecoverable?: Readonly<Record<string, string>>
}

/**
 * PENDING waits, PROCESSED continues, a known unrecoverable status fails with
 * its description and anything else fails as unexpected.
 */
export async function checkVendorStatus(
  runtime: FulfillmentRuntime,
  context: FulfillmentContext,
  status: string,
  options: VendorStatusCheckOptions = {}
): Promise<StepResult> {
  if (status === VendorStatus.PENDING) {
    return waitForVendor(runtime, context)
  }

  if (status === VendorStatus.PROCESSED) {
    return StepResult.NEXT
  }

  const description = (options.unrecoverable ?? UNRECOVERABLE_ORDER_STATUS_DESCRIPTIONS)[status]
  const error = description
    ? formatOrderError(ERR_UNRECOVERABLE_VENDOR_STATUS, { description })
    : formatOrderError(ERR_UNEXPECTED_VENDOR_STATUS, { status })

  await switchOrderToFailed(runtime, context, error)
  return StepResult.HALT
}
