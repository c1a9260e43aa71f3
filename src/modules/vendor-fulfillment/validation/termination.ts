import { Validate3YCCommitment } from "../commitment"
import { ERR_INVALID_TERMINATION_QUANTITY } from "../order-errors"
import { Pipeline } from "../pipeline"
import {
  GetReturnOrders,
  GetReturnableOrders,
  ValidateReturnableOrders,
} from "../returnable-orders"
import { SetupContext, ValidateDuplicateLines, ValidateRenewalWindow } from "../steps/shared"

export function createTerminationValidation(): Pipeline {
  return new Pipeline("validation_termination", [
    new SetupContext(),
    new ValidateDuplicateLines("validating"),
    new ValidateRenewalWindow("validating"),
    new GetReturnOrders(),
    new GetReturnableOrders(),
    new ValidateReturnableOrders("validating", ERR_INVALID_TERMINATION_QUANTITY),
    new Validate3YCCommitment("validating"),
  ])
}
