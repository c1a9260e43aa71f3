import { Validate3YCCommitment } from "../commitment"
import { Pipeline } from "../pipeline"
import {
  GetReturnOrders,
  GetReturnableOrders,
  ValidateReturnableOrders,
} from "../returnable-orders"
import { UpdatePrices } from "../steps/pricing"
import {
  GetPreviewOrder,
  SetupContext,
  ValidateDuplicateLines,
  ValidateRenewalWindow,
} from "../steps/shared"

export function createChangeValidation(): Pipeline {
  return new Pipeline("validation_change", [
    new SetupContext(),
    new ValidateDuplicateLines("validating"),
    new ValidateRenewalWindow("validating"),
    new GetReturnOrders(),
    new GetReturnableOrders(),
    new ValidateReturnableOrders("validating"),
    new Validate3YCCommitment("validating"),
    new GetPreviewOrder("validating"),
    new UpdatePrices("validating"),
  ])
}
