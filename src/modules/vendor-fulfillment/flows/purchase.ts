import { Validate3YCCommitment } from "../commitment"
import { TemplateName } from "../constants"
import { SetupDueDate } from "../due-date"
import { Pipeline } from "../pipeline"
import { CreateCustomer, PrepareCustomerData } from "../steps/customer"
import { UpdatePrices } from "../steps/pricing"
import {
  CompleteOrder,
  GetPreviewOrder,
  RefreshCustomer,
  SetOrUpdateCotermDate,
  SetupContext,
  StartOrderProcessing,
  SubmitNewOrder,
  ValidateDuplicateLines,
} from "../steps/shared"
import { CreateOrUpdateSubscriptions } from "../steps/subscriptions"

export function createPurchaseFlow(): Pipeline {
  return new Pipeline("fulfillment_purchase", [
    new SetupContext(),
    new StartOrderProcessing(TemplateName.PURCHASE_PROCESSING),
    new SetupDueDate(),
    new ValidateDuplicateLines(),
    new PrepareCustomerData(),
    new CreateCustomer(),
    new Validate3YCCommitment(),
    new GetPreviewOrder(),
    new UpdatePrices(),
    new SubmitNewOrder(),
    new CreateOrUpdateSubscriptions(),
    new RefreshCustomer(),
    new SetOrUpdateCotermDate(),
    new CompleteOrder(TemplateName.PURCHASE_COMPLETED),
  ])
}
