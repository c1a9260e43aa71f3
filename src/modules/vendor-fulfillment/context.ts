import { z } from "zod"
import type { Order, OrderLine } from "../../integrations/marketplace/types"
import type {
  ReturnableOrderInfo,
  VendorCustomer,
  VendorOrder,
  VendorTransfer,
} from "../../integrations/vendor/types"
import { DEFAULT_MARKET_SEGMENT, DEFAULT_PREFERRED_LANGUAGE, OrderingParam } from "./constants"
import { getCustomerIdParameter, getOrderingText, getParameterObject } from "./parameters"

export const OrderType = {
  PURCHASE: "purchase",
  CHANGE: "change",
  TERMINATION: "termination",
  TRANSFER: "transfer",
  RESELLER_CHANGE: "reseller_change",
  CONFIGURATION: "configuration",
} as const

export type OrderType = (typeof OrderType)[keyof typeof OrderType]

/** Fulfillment runs enforce (fail or query the order); draft validation only annotates it. */
export type ValidationMode = "enforcing" | "validating"

export type UpdatedSubscription = {
  subscriptionId: string
  previousQuantity: number
  previousAutoRenewal: boolean
}

/**
 * Per-invocation processing state. Built fresh from the order on every run
 * and discarded afterwards; durable state lives in order parameters.
 */
export type FulfillmentContext = {
  order: Order
  orderId: string
  orderType: OrderType
  agreementId: string
  authorizationId: string
  sellerId: string
  productId: string
  currency: string
  marketSegment: string

  downsizeLines: OrderLine[]
  upsizeLines: OrderLine[]
  newLines: OrderLine[]

  vendorCustomerId?: string
  vendorCustomer?: VendorCustomer

  vendorNewOrderId?: string
  vendorNewOrder?: VendorOrder
  vendorPreviewOrder?: VendorOrder
  /** In-flight RETURN orders keyed by base SKU. */
  vendorReturnOrders: Record<string, VendorOrder[]>
  /** Matched returnable orders keyed by base SKU; `null` marks an unmatched SKU. */
  vendorReturnableOrders: Record<string, ReturnableOrderInfo[] | null>

  transfer: {
    membershipId?: string
    approvalCode?: string
    adminEmail?: string
    vendorTransfer?: VendorTransfer
  }
  updatedSubscriptions: UpdatedSubscription[]

  /** Once false, steps stop mutating order data. */
  validationSucceeded: boolean
}

export function classifyLines(lines: OrderLine[]): {
  downsizeLines: OrderLine[]
  upsizeLines: OrderLine[]
  newLines: OrderLine[]
} {
  return {
    downsizeLines: lines.filter((line) => line.quantity < line.oldQuantity),
    upsizeLines: lines.filter((line) => line.oldQuantity > 0 && line.quantity > line.oldQuantity),
    newLines: lines.filter((line) => line.oldQuantity === 0 && line.quantity > 0),
  }
}

export function createContext(
  order: Order,
  orderType: OrderType,
  marketSegment: string = DEFAULT_MARKET_SEGMENT
): FulfillmentContext {
  return {
    order,
    orderId: order.id,
    orderType,
    agreementId: order.agreement.id,
    authorizationId: order.authorization.id,
    sellerId: order.seller.id,
    productId: order.product.id,
    currency: order.authorization.currency ?? "",
    marketSegment,
    ...classifyLines(order.lines),
    vendorCustomerId: getCustomerIdParameter(order) ?? order.agreement.externalIds.vendor,
    vendorReturnOrders: {},
    vendorReturnableOrders: {},
    transfer: {},
    updatedSubscriptions: [],
    validationSucceeded: true,
  }
}

const addressSchema = z.object({
  country: z.string().default(""),
  state: z.string().default(""),
  city: z.string().default(""),
  addressLine1: z.string().default(""),
  addressLine2: z.string().default(""),
  postCode: z.string().default(""),
})

const contactSchema = z.object({
  firstName: z.string().default(""),
  lastName: z.string().default(""),
  email: z.string().default(""),
  phone: z.string().optional(),
})

export type CustomerAddress = z.infer<typeof addressSchema>
export type CustomerContact = z.infer<typeof contactSchema>

export type CustomerData = {
  companyName?: string
  preferredLanguage: string
  address?: CustomerAddress
  contact?: CustomerContact
  commitmentRequested: boolean
  commitmentLicenses?: number
  commitmentConsumables?: number
}

function readQuantity(value: string | undefined): number | undefined {
  if (!value) {
    return undefined
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) ? parsed : undefined
}

/** Customer-facing ordering parameters, read on demand. */
export function getCustomerData(order: Order): CustomerData {
  const address = addressSchema.safeParse(
    getParameterObject(order.parameters, "ordering", OrderingParam.ADDRESS)
  )
  const contact = contactSchema.safeParse(
    getParameterObject(order.parameters, "ordering", OrderingParam.CONTACT)
  )

  return {
    companyName: getOrderingText(order, OrderingParam.COMPANY_NAME),
    preferredLanguage:
      getOrderingText(order, OrderingParam.PREFERRED_LANGUAGE) ?? DEFAULT_PREFERRED_LANGUAGE,
    address: address.success ? address.data : undefined,
    contact: contact.success ? contact.data : undefined,
    commitmentRequested: getOrderingText(order, OrderingParam.COMMITMENT) === "Yes",
    commitmentLicenses: readQuantity(getOrderingText(order, OrderingParam.COMMITMENT_LICENSES)),
    commitmentConsumables: readQuantity(
      getOrderingText(order, OrderingParam.COMMITMENT_CONSUMABLES)
    ),
  }
}
