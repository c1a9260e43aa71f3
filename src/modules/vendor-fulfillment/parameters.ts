import type {
  Order,
  OrderError,
  Parameter,
  ParameterBag,
} from "../../integrations/marketplace/types"
import { FulfillmentParam, type OrderingParam } from "./constants"

export type ParameterGroup = keyof ParameterBag
type ParameterValue = Parameter["value"]

export function getParameter(
  parameters: ParameterBag,
  group: ParameterGroup,
  externalId: string
): Parameter | undefined {
  return parameters[group].find((parameter) => parameter.externalId === externalId)
}

/** Trimmed string value of a parameter; blank values read as unset. */
export function getParameterText(
  parameters: ParameterBag,
  group: ParameterGroup,
  externalId: string
): string | undefined {
  const value = getParameter(parameters, group, externalId)?.value
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

export function getParameterObject(
  parameters: ParameterBag,
  group: ParameterGroup,
  externalId: string
): Record<string, unknown> | undefined {
  const value = getParameter(parameters, group, externalId)?.value
  return typeof value === "object" ? value : undefined
}

function updateParameter(
  parameters: ParameterBag,
  group: ParameterGroup,
  externalId: string,
  patch: (parameter: Parameter) => Parameter
): ParameterBag {
  const existing = parameters[group]
  const found = existing.some((parameter) => parameter.externalId === externalId)
  const next = found
    ? existing.map((parameter) => (parameter.externalId === externalId ? patch(parameter) : parameter))
    : [...existing, patch({ externalId })]

  return { ...parameters, [group]: next }
}

export function setParameterValue(
  parameters: ParameterBag,
  group: ParameterGroup,
  externalId: string,
  value: ParameterValue
): ParameterBag {
  return updateParameter(parameters, group, externalId, (parameter) => ({ ...parameter, value }))
}

/**
 * Flags an ordering parameter so the submitter sees the error next to the
 * field. The parameter is made visible and editable again.
 */
export function setOrderingParameterError(
  parameters: ParameterBag,
  externalId: OrderingParam,
  error: OrderError,
  options: { required?: boolean } = {}
): ParameterBag {
  return updateParameter(parameters, "ordering", externalId, (parameter) => ({
    ...parameter,
    error,
    constraints: {
      ...parameter.constraints,
      hidden: false,
      readonly: false,
      required: options.required ?? parameter.constraints?.required ?? false,
    },
  }))
}

export function resetOrderingErrors(parameters: ParameterBag): ParameterBag {
  return {
    ...parameters,
    ordering: parameters.ordering.map((parameter) => ({ ...parameter, error: null })),
  }
}

export function withParameters(order: Order, parameters: ParameterBag): Order {
  return { ...order, parameters }
}

export function getFulfillmentText(order: Order, externalId: FulfillmentParam): string | undefined {
  return getParameterText(order.parameters, "fulfillment", externalId)
}

export function setFulfillmentValue(
  order: Order,
  externalId: FulfillmentParam,
  value: string
): Order {
  return withParameters(order, setParameterValue(order.parameters, "fulfillment", externalId, value))
}

export function getOrderingText(order: Order, externalId: OrderingParam): string | undefined {
  return getParameterText(order.parameters, "ordering", externalId)
}

export function getDueDate(order: Order): string | undefined {
  return getFulfillmentText(order, FulfillmentParam.DUE_DATE)
}

export function getRetryCount(order: Order): number {
  const raw = getFulfillmentText(order, FulfillmentParam.RETRY_COUNT)
  const parsed = raw ? Number.parseInt(raw, 10) : 0
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0
}

export function getCotermDate(order: Order): string | undefined {
  return getFulfillmentText(order, FulfillmentParam.COTERM_DATE)
}

export function getCustomerIdParameter(order: Order): string | undefined {
  return getFulfillmentText(order, FulfillmentParam.CUSTOMER_ID)
}
