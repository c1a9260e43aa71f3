import type { OrderError } from "../../integrations/marketplace/types"

export type OrderErrorDefinition = {
  readonly id: string
  readonly template: string
}

function define(id: string, template: string): OrderErrorDefinition {
  return { id, template }
}

/** Fills `{name}` placeholders; unknown placeholders are left as written. */
export function formatOrderError(
  definition: OrderErrorDefinition,
  values: Record<string, string | number> = {}
): OrderError {
  const message = definition.template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match
  )

  return { id: definition.id, message }
}

export const ERR_VENDOR_ERROR = define("FUL0001", "{details}")
export const ERR_DUE_DATE_REACHED = define(
  "FUL0002",
  "Due date {due_date} for order processing is reached."
)
export const ERR_MAX_ATTEMPTS = define("FUL0003", "Max processing attempts reached ({max_attempts}).")
export const ERR_UNRECOVERABLE_VENDOR_STATUS = define("FUL0004", "{description}")
export const ERR_UNEXPECTED_VENDOR_STATUS = define(
  "FUL0005",
  "Unexpected status ({status}) received from the vendor."
)
export const ERR_DUPLICATED_ITEMS = define(
  "FUL0006",
  "The order contains duplicated items: {duplicates}."
)
export const ERR_EXISTING_ITEMS = define(
  "FUL0007",
  "The items {duplicates} are already part of the agreement. Please change their quantity instead."
)
export const ERR_NO_RETURNABLE_ORDERS = define(
  "FUL0008",
  "No vendor orders that match the desired quantity delta have been found for the following SKUs: {non_returnable_skus}"
)
export const ERR_COMMITMENT_LICENSES = define(
  "FUL0009",
  "The quantity selected of {selected_quantity} would place the account below the minimum commitment of {minimum} licenses for the three-year commitment."
)
export const ERR_COMMITMENT_CONSUMABLES = define(
  "FUL0010",
  "The quantity selected of {selected_quantity} would place the account below the minimum commitment of {minimum} consumables for the three-year commitment."
)
export const ERR_COMMITMENT_BOTH = define(
  "FUL0011",
  "The selected quantities would place the account below the minimum commitment of {minimum_licenses} licenses and {minimum_consumables} consumables for the three-year commitment."
)
export const ERR_COMMITMENT_BLOCKED = define(
  "FUL0012",
  "The 3-year commitment is in status {status}. Please contact support to renew the commitment."
)
export const ERR_COMMITMENT_MINIMUM_REQUEST = define(
  "FUL0013",
  "The quantity of {category} in the order ({selected_quantity}) is below the requested minimum commitment of {minimum}."
)
export const ERR_COMMITMENT_NO_MINIMUMS = define(
  "FUL0014",
  "A 3-year commitment requires a minimum of {min_licenses} licenses or {min_consumables} consumables."
)
export const ERR_ADDRESS = define("FUL0015", "The provided address is invalid: {details}.")
export const ERR_FIELD = define("FUL0016", "The provided {title} is invalid: {details}.")
export const ERR_RENEWAL_WINDOW = define(
  "FUL0017",
  "The order cannot be processed in the {hours} hours before the anniversary date {coterm_date}."
)
export const ERR_INVALID_RENEWAL_STATE = define(
  "FUL0018",
  "The renewal quantity could not be updated: {error}"
)
export const ERR_SUBSCRIPTION_UPDATE = define(
  "FUL0019",
  "Error updating the subscriptions: {error}"
)
export const ERR_MEMBERSHIP_ITEMS_DONT_MATCH = define(
  "FUL0020",
  "The items of the membership do not match the items of the order: {line_skus}."
)
export const ERR_MEMBERSHIP_ID = define(
  "FUL0021",
  "The membership {membership_id} cannot be transferred: {error}"
)
export const ERR_TRANSFER_PREVIEW = define("FUL0022", "Transfer preview failed: {error}")
export const ERR_RESELLER_CHANGE = define(
  "FUL0023",
  "The reseller change request failed: {error}"
)
export const ERR_CUSTOMER_DATA_MISSING = define(
  "FUL0024",
  "The {title} is required to create the customer account."
)
export const ERR_SKU_NOT_FOUND = define(
  "FUL0025",
  "No vendor subscription found for SKU {sku}."
)
export const ERR_INVALID_TERMINATION_QUANTITY = define(
  "FUL0026",
  "Cannot terminate the following SKUs because no vendor orders within the cancellation window match the quantity: {non_returnable_skus}"
)
export const ERR_MEMBERSHIP_EMPTY = define(
  "FUL0027",
  "The membership {membership_id} has no items that can be transferred."
)
export const ERR_ITEM_NOT_IN_CATALOG = define(
  "FUL0028",
  "The item {sku} of the vendor account is not available in the product catalog."
)
export const ERR_RESELLER_CHANGE_PREVIEW = define(
  "FUL0029",
  "The reseller change code {code} cannot be used: {error}"
)
