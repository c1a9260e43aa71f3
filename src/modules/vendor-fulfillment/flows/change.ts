import { Validate3YCCommitment } from "../commitment"
import { TemplateName } from "../constants"
import { SetupDueDate } from "../due-date"
import { Pipeline } from "../pipeline"
import {
  GetReturnOrders,
  GetReturnableOrders,
  SubmitReturnOrders,
  ValidateReturnableOrders,
} from "../returnable-orders"
import { UpdatePrices } from "../steps/pricing"
import {
  CompleteOrder,
  GetPreviewOrder,
  SetOrUpdateCotermDate,
  SetupContext,
  StartOrderProcessing,
  SubmitNewOrder,
  ValidateDuplicateLines,
  ValidateRenewalWindow,
} from "../steps/shared"
import { CreateOrUpdateSubscriptions, UpdateRenewalQuantities } from "../steps/subscriptions"

/**
 * Downsizes are cancelled through RETURN orders before the NEW order for
 * upsizes and new items is placed.
 */
export function createChangeFlow(): Pipeline {
  return new Pipeline("fulfillment_change", [
    new SetupContext(),
    new StartOrderProcessing(TemplateName.CHANGE_PROCESSING),
    new SetupDueDate(),
    new ValidateDuplicateLines(),
    new SetOrUpdateCotermDate(),
    new ValidateRenewalWindow(),
    new GetReturnOrders(),
    new GetReturnableOrders(),
    new ValidateReturnableOrders(),
    new Validate3YCCommitment(),
    new GetPreviewOrder(),
    new UpdatePrices(),
    new SubmitReturnOrders(),
    new SubmitNewOrder(),
    new UpdateRenewalQuantities(),
    new CreateOrUpdateSubscriptions(),
    new CompleteOrder(TemplateName.CHANGE_COMPLETED),
  ])
}
