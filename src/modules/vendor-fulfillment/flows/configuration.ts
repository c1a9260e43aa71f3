import { TemplateName } from "../constants"
import { SetupDueDate } from "../due-date"
import { Pipeline } from "../pipeline"
import {
  CompleteOrder,
  SetOrUpdateCotermDate,
  SetupContext,
  StartOrderProcessing,
  ValidateRenewalWindow,
} from "../steps/shared"
import { SubscriptionUpdateAutoRenewal, autoRenewalTemplate } from "../steps/subscriptions"

export function createConfigurationFlow(): Pipeline {
  return new Pipeline("fulfillment_configuration", [
    new SetupContext(),
    new StartOrderProcessing(TemplateName.CONFIGURATION_PROCESSING),
    new SetupDueDate(),
    new SetOrUpdateCotermDate(),
    new ValidateRenewalWindow(),
    new SubscriptionUpdateAutoRenewal(),
    new CompleteOrder(autoRenewalTemplate),
  ])
}
