import { logStructured } from "../logging/structured-logger"
import { recordPipelineRun } from "../observability/metrics"
import type { FulfillmentContext } from "./context"
import type { FulfillmentRuntime } from "./runtime"

export const StepResult = {
  NEXT: "next",
  HALT: "halt",
} as const

export type StepResult = (typeof StepResult)[keyof typeof StepResult]

/**
 * A unit of work in a flow. Returning `HALT` stops the run without error:
 * the order is now waiting on the vendor or already in a terminal state.
 */
export interface Step {
  readonly name: string
  run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult>
}

export type PipelineErrorHandler = (
  error: unknown,
  context: FulfillmentContext,
  stepName: string
) => Promise<void> | void

export type PipelineRunResult = {
  completed: boolean
  haltedAt?: string
  stepsRun: number
}

const rethrow: PipelineErrorHandler = (error) => {
  throw error
}

export class Pipeline {
  readonly name: string
  readonly steps: readonly Step[]

  constructor(name: string, steps: readonly Step[]) {
    this.name = name
    this.steps = steps
  }

  async run(
    runtime: FulfillmentRuntime,
    context: FulfillmentContext,
    errorHandler: PipelineErrorHandler = rethrow
  ): Promise<PipelineRunResult> {
    const startedAtMs = runtime.now().getTime()
    let stepsRun = 0

    for (const step of this.steps) {
      stepsRun += 1
      logStructured(runtime.logger, "debug", "pipeline.step.started", {
        workflow_name: this.name,
        step_name: step.name,
        order_id: context.orderId,
        agreement_id: context.agreementId,
      })

      let result: StepResult
      try {
        result = await step.run(runtime, context)
      } catch (error) {
        recordPipelineRun(runtime.metrics, this.name, "error", runtime.now().getTime() - startedAtMs)
        await errorHandler(error, context, step.name)
        // a handler that swallows the error still ends the run here
        return { completed: false, haltedAt: step.name, stepsRun }
      }

      if (result === StepResult.HALT) {
        recordPipelineRun(runtime.metrics, this.name, "halted", runtime.now().getTime() - startedAtMs)
        return { completed: false, haltedAt: step.name, stepsRun }
      }
    }

    recordPipelineRun(runtime.metrics, this.name, "completed", runtime.now().getTime() - startedAtMs)
    return { completed: true, stepsRun }
  }
}
