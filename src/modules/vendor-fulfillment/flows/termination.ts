import { Validate3YCCommitment } from "../commitment"
import { TemplateName } from "../constants"
import { SetupDueDate } from "../due-date"
import { Pipeline } from "../pipeline"
import { GetReturnOrders, GetReturnableOrders, SubmitReturnOrders } from "../returnable-orders"
import {
  CompleteOrder,
  SetOrUpdateCotermDate,
  SetupContext,
  StartOrderProcessing,
  ValidateRenewalWindow,
} from "../steps/shared"
import { SwitchAutoRenewalOff } from "../steps/subscriptions"

export function createTerminationFlow(): Pipeline {
  return new Pipeline("fulfillment_termination", [
    new SetupContext(),
    new StartOrderProcessing(TemplateName.TERMINATION_PROCESSING),
    new SetupDueDate(),
    new SetOrUpdateCotermDate(),
    new ValidateRenewalWindow(),
    new GetReturnOrders(),
    new GetReturnableOrders(),
    new Validate3YCCommitment(),
    new SubmitReturnOrders(),
    new SwitchAutoRenewalOff(),
    new CompleteOrder(TemplateName.TERMINATION_COMPLETED),
  ])
}
