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
  CommitResellerChange,
  CreateTransferSubscriptions,
  EnableAutoRenewal,
  GetTransferCustomer,
  SetupResellerChangeContext,
} from "../steps/transfer"

export function createResellerChangeFlow(): Pipeline {
  return new Pipeline("fulfillment_reseller_change", [
    new SetupContext(),
    new StartOrderProcessing(TemplateName.RESELLER_CHANGE_PROCESSING),
    new SetupDueDate(),
    new SetupResellerChangeContext(),
    new CommitResellerChange(),
    new CheckVendorTransfer("reseller_change"),
    new GetTransferCustomer(),
    new EnableAutoRenewal(),
    new CreateTransferSubscriptions(),
    new SetOrUpdateCotermDate(),
    new CompleteOrder(TemplateName.RESELLER_CHANGE_COMPLETED),
  ])
}
