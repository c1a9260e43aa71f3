import { Validate3YCCommitment } from "../commitment"
import { Pipeline } from "../pipeline"
import { ValidateCustomerData } from "../steps/customer"
import { UpdatePrices } from "../steps/pricing"
import { GetPreviewOrder, SetupContext, ValidateDuplicateLines } from "../steps/shared"

export function createPurchaseValidation(): Pipeline {
  return new Pipeline("validation_purchase", [
    new SetupContext(),
    new ValidateDuplicateLines("validating"),
    new ValidateCustomerData("validating"),
    new Validate3YCCommitment("validating"),
    new GetPreviewOrder("validating"),
    new UpdatePrices("validating"),
  ])
}
