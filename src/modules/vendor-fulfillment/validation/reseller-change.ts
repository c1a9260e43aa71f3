import { Pipeline } from "../pipeline"
import { SetupContext } from "../steps/shared"
import { PreviewResellerChange, SetupResellerChangeContext } from "../steps/transfer"

export function createResellerChangeValidation(): Pipeline {
  return new Pipeline("validation_reseller_change", [
    new SetupContext(),
    new SetupResellerChangeContext("validating"),
    new PreviewResellerChange(),
  ])
}
