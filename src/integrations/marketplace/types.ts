import { z } from "zod"

export const MarketplaceOrderStatus = {
  DRAFT: "Draft",
  PROCESSING: "Processing",
  QUERYING: "Querying",
  COMPLETED: "Completed",
  FAILED: "Failed",
} as const

export type MarketplaceOrderStatus =
  (typeof MarketplaceOrderStatus)[keyof typeof MarketplaceOrderStatus]

export const orderErrorSchema = z.object({
  id: z.string(),
  message: z.string(),
})

export type OrderError = z.infer<typeof orderErrorSchema>

export const parameterSchema = z.object({
  id: z.string().optional(),
  externalId: z.string(),
  name: z.string().optional(),
  type: z.string().optional(),
  // structured parameters (address, contact) carry an object value
  value: z.union([z.string(), z.record(z.string(), z.unknown())]).optional(),
  error: orderErrorSchema.nullable().optional(),
  constraints: z
    .object({
      hidden: z.boolean().optional(),
      required: z.boolean().optional(),
      readonly: z.boolean().optional(),
    })
    .optional(),
})

export type Parameter = z.infer<typeof parameterSchema>

export const parameterBagSchema = z.object({
  ordering: z.array(parameterSchema).default([]),
  fulfillment: z.array(parameterSchema).default([]),
})

export type ParameterBag = z.infer<typeof parameterBagSchema>

const externalIdsSchema = z
  .object({
    vendor: z.string().optional(),
  })
  .default({})

export const orderLineSchema = z.object({
  // draft lines added during validation have no id yet
  id: z.string().default(""),
  quantity: z.number().int(),
  oldQuantity: z.number().int().default(0),
  item: z.object({
    id: z.string(),
    name: z.string().default(""),
    externalIds: z.object({ vendor: z.string() }),
    offerType: z.enum(["LICENSE", "CONSUMABLES"]).optional(),
  }),
  price: z
    .object({
      unitPP: z.number().optional(),
    })
    .optional(),
})

export type OrderLine = z.infer<typeof orderLineSchema>

export const orderSubscriptionSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  status: z.string().optional(),
  autoRenew: z.boolean().optional(),
  externalIds: externalIdsSchema,
  lines: z
    .array(
      z.object({
        id: z.string(),
        quantity: z.number().int().optional(),
        item: z.object({ id: z.string() }).optional(),
      })
    )
    .default([]),
  parameters: parameterBagSchema.optional(),
})

export type OrderSubscription = z.infer<typeof orderSubscriptionSchema>

export const agreementSchema = z.object({
  id: z.string(),
  externalIds: externalIdsSchema,
  product: z.object({ id: z.string() }).optional(),
  licensee: z.object({ id: z.string() }).optional(),
  subscriptions: z.array(orderSubscriptionSchema).default([]),
  parameters: parameterBagSchema.optional(),
})

export type Agreement = z.infer<typeof agreementSchema>

export const orderSchema = z.object({
  id: z.string(),
  type: z.string(),
  status: z.string(),
  agreement: agreementSchema,
  authorization: z.object({
    id: z.string(),
    currency: z.string().optional(),
  }),
  seller: z.object({ id: z.string() }),
  product: z.object({ id: z.string() }),
  lines: z.array(orderLineSchema).default([]),
  subscriptions: z.array(orderSubscriptionSchema).default([]),
  parameters: parameterBagSchema.default({ ordering: [], fulfillment: [] }),
  externalIds: externalIdsSchema,
  template: z
    .object({
      id: z.string(),
      name: z.string().optional(),
    })
    .optional(),
  error: orderErrorSchema.nullable().optional(),
})

export type Order = z.infer<typeof orderSchema>

export const orderListSchema = z.object({
  data: z.array(orderSchema).default([]),
  $meta: z
    .object({
      pagination: z.object({
        offset: z.number().int(),
        limit: z.number().int(),
        total: z.number().int(),
      }),
    })
    .optional(),
})

export const productItemSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  externalIds: z.object({ vendor: z.string() }),
})

export type ProductItem = z.infer<typeof productItemSchema>

export const productItemListSchema = z.object({
  data: z.array(productItemSchema).default([]),
})

export const templateSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string().optional(),
  default: z.boolean().optional(),
})

export type Template = z.infer<typeof templateSchema>

export const licenseeSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  address: z
    .object({
      country: z.string().default(""),
      state: z.string().default(""),
      city: z.string().default(""),
      addressLine1: z.string().default(""),
      addressLine2: z.string().default(""),
      postCode: z.string().default(""),
    })
    .optional(),
  contact: z
    .object({
      firstName: z.string().default(""),
      lastName: z.string().default(""),
      email: z.string().default(""),
      phone: z.string().optional(),
    })
    .optional(),
})

export type Licensee = z.infer<typeof licenseeSchema>

export type OrderUpdate = {
  parameters?: ParameterBag
  lines?: Array<{ id: string; price: { unitPP?: number } }>
  externalIds?: { vendor?: string }
  template?: { id: string }
  error?: OrderError | null
}

export type SubscriptionCreate = {
  name: string
  parameters: { fulfillment: Array<{ externalId: string; value: string }> }
  externalIds: { vendor: string }
  lines: Array<{ id: string }>
  startDate: string
  commitmentDate?: string
  autoRenew: boolean
}

export type SubscriptionParametersUpdate = {
  parameters: { fulfillment: Array<{ externalId: string; value: string }> }
}

export type NotificationMessage = {
  title: string
  text: string
}
