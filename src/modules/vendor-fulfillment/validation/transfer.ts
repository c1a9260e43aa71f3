import { Pipeline } from "../pipeline"
import { SetupContext } from "../steps/shared"
import { PreviewTransferLines, SetupTransferContext } from "../steps/transfer"

export function createTransferValidation(): Pipeline {
  return new Pipeline("validation_transfer", [
    new SetupContext(),
    new SetupTransferContext("validating"),
    new PreviewTransferLines(),
  ])
}
