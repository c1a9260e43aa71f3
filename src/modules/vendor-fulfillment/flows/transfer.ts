import { TemplateName } from "../constants"
import { SetupDueDate } from "../due-date"
import { Pipeline } from "../pipeline"
import {
  CompleteOrder,
  SetOrUpdateCotermDate,
  SetupContext,
  StartOrderProcessing,
} from "../steps/shared"
import {
  CheckVendorTransfer,
  CreateTransferSubscriptions,
  GetTransferCustomer,
  SetupTransferContext,
  ValidateTransfer,
} from "../steps/transfer"

export function createTransferFlow(): Pipeline {
  return new Pipeline("fulfillment_transfer", [
    new SetupContext(),
    new StartOrderProcessing(TemplateName.TRANSFER_PROCESSING),
    new SetupDueDate(),
    new SetupTransferContext(),
    new ValidateTransfer(),
    new CheckVendorTransfer("membership"),
    new GetTransferCustomer(),
    new CreateTransferSubscriptions(),
    new SetOrUpdateCotermDate(),
    new CompleteOrder(TemplateName.TRANSFER_COMPLETED),
  ])
}
