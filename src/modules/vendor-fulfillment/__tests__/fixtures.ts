import type { MarketplaceApi } from "../../../integrations/marketplace/client"
import type {
  Order,
  OrderError,
  OrderLine,
  OrderSubscription,
  Parameter,
  ParameterBag,
  SubscriptionCreate,
} from "../../../integrations/marketplace/types"
import type { Notifier } from "../../../integrations/notifications/notifier"
import type { VendorApi } from "../../../integrations/vendor/client"
import type {
  ReturnableOrderInfo,
  VendorCustomer,
  VendorOrder,
  VendorSubscription,
} from "../../../integrations/vendor/types"
import { createMetricsRegistry } from "../../observability/metrics"
import type { FulfillmentConfig } from "../config"
import type { FulfillmentRuntime } from "../runtime"

export const NOW = new Date("2026-03-10T12:00:00.000Z")

export function buildConfig(overrides: Partial<FulfillmentConfig> = {}): FulfillmentConfig {
  return {
    vendor: {
      baseUrl: "https://vendor.test",
      authUrl: "https://vendor.test/oauth/token",
      clientId: "test-client",
      clientSecret: "test-secret",
    },
    marketplace: { baseUrl: "https://marketplace.test", token: "test-token" },
    dueDateDays: 30,
    maxRetryAttempts: 10,
    orderCreationWindowHours: 24,
    maxReturnableCandidates: 16,
    productIds: ["PRD-1111"],
    productSegments: {},
    ...overrides,
  }
}

export function buildLine(input: {
  id?: string
  sku: string
  quantity: number
  oldQuantity?: number
  itemId?: string
  name?: string
  offerType?: "LICENSE" | "CONSUMABLES"
}): OrderLine {
  return {
    id: input.id ?? "ALI-0001",
    quantity: input.quantity,
    oldQuantity: input.oldQuantity ?? 0,
    item: {
      id: input.itemId ?? `ITM-${input.sku}`,
      name: input.name ?? `Item ${input.sku}`,
      externalIds: { vendor: input.sku },
      offerType: input.offerType,
    },
  }
}

export function param(externalId: string, value: Parameter["value"]): Parameter {
  return { externalId, value }
}

export function buildOrder(
  input: {
    id?: string
    type?: string
    lines?: OrderLine[]
    subscriptions?: OrderSubscription[]
    agreementSubscriptions?: OrderSubscription[]
    ordering?: Parameter[]
    fulfillment?: Parameter[]
    customerId?: string
    vendorOrderId?: string
    licenseeId?: string
  } = {}
): Order {
  return {
    id: input.id ?? "ORD-1000",
    type: input.type ?? "Purchase",
    status: "Processing",
    agreement: {
      id: "AGR-1000",
      externalIds: { vendor: input.customerId },
      licensee: input.licenseeId ? { id: input.licenseeId } : undefined,
      subscriptions: input.agreementSubscriptions ?? [],
    },
    authorization: { id: "AUT-1000", currency: "USD" },
    seller: { id: "SEL-1000" },
    product: { id: "PRD-1111" },
    lines: input.lines ?? [],
    subscriptions: input.subscriptions ?? [],
    parameters: { ordering: input.ordering ?? [], fulfillment: input.fulfillment ?? [] },
    externalIds: { vendor: input.vendorOrderId },
  }
}

export function buildVendorOrder(input: Partial<VendorOrder> & { orderId: string }): VendorOrder {
  return {
    externalReferenceId: "ORD-1000",
    orderType: "NEW",
    status: "1000",
    creationDate: "2026-03-01T00:00:00Z",
    lineItems: [],
    ...input,
  }
}

export function buildReturnable(orderId: string, sku: string, quantity: number): ReturnableOrderInfo {
  const line = { extLineItemNumber: 1, offerId: `${sku}CA01A12`, quantity }
  return {
    order: buildVendorOrder({ orderId, lineItems: [line] }),
    line,
    quantity,
  }
}

export function buildVendorSubscription(
  input: Partial<VendorSubscription> & { subscriptionId: string; offerId: string }
): VendorSubscription {
  return {
    currentQuantity: 10,
    status: "1000",
    creationDate: "2025-04-01T00:00:00Z",
    renewalDate: "2027-04-01",
    autoRenewal: { enabled: true, renewalQuantity: 10 },
    ...input,
  }
}

export function buildCustomer(input: Partial<VendorCustomer> = {}): VendorCustomer {
  return {
    customerId: "CUS-1",
    cotermDate: "2026-09-01",
    benefits: [],
    ...input,
  }
}

export function createVendorFake(): jest.Mocked<VendorApi> {
  return {
    createPreviewOrder: jest.fn(),
    createNewOrder: jest.fn(),
    getOrder: jest.fn(),
    getOrders: jest.fn(),
    getSubscription: jest.fn(),
    getSubscriptions: jest.fn().mockResolvedValue([]),
    updateSubscription: jest.fn(),
    getReturnableOrdersBySku: jest.fn().mockResolvedValue([]),
    getReturnOrdersByExternalReference: jest.fn().mockResolvedValue({}),
    createReturnOrder: jest.fn(),
    getCustomer: jest.fn().mockResolvedValue(buildCustomer()),
    createCustomerAccount: jest.fn(),
    getSkuPrices: jest.fn().mockResolvedValue({}),
    previewTransfer: jest.fn(),
    createTransfer: jest.fn(),
    getTransfer: jest.fn(),
    resellerChangeRequest: jest.fn(),
    getResellerTransfer: jest.fn(),
  }
}

type TransitionInput = { parameters: ParameterBag; error?: OrderError }

/** Marketplace stand-in: status transitions echo the order back with the sent parameters. */
export function createMarketplaceFake(order: Order): jest.Mocked<MarketplaceApi> {
  return {
    getOrder: jest.fn().mockResolvedValue(order),
    listOrders: jest.fn().mockResolvedValue([]),
    updateOrder: jest.fn().mockResolvedValue(order),
    completeOrder: jest.fn(async (_id: string, input: TransitionInput) => ({
      ...order,
      status: "Completed",
      parameters: input.parameters,
    })),
    failOrder: jest.fn(async (_id: string, input: TransitionInput & { reason: string }) => ({
      ...order,
      status: "Failed",
      error: input.error,
      parameters: input.parameters,
    })),
    queryOrder: jest.fn(async (_id: string, input: TransitionInput) => ({
      ...order,
      status: "Querying",
      parameters: input.parameters,
    })),
    createSubscription: jest.fn(async (_id: string, input: SubscriptionCreate) => ({
      id: "SUB-NEW",
      name: input.name,
      externalIds: input.externalIds,
      lines: input.lines,
    })),
    updateSubscription: jest.fn(),
    getOrderSubscriptionByExternalId: jest.fn().mockResolvedValue(undefined),
    getAgreement: jest.fn(),
    updateAgreement: jest.fn(),
    getLicensee: jest.fn(),
    getProductTemplateOrDefault: jest.fn(async (_productId: string, status: string, name?: string) => ({
      id: `TPL-${status}`,
      name: name ?? status,
    })),
    getProductItemsBySkus: jest.fn().mockResolvedValue([]),
  }
}

export function createNotifierFake(): jest.Mocked<Notifier> {
  return {
    notifyException: jest.fn().mockResolvedValue(undefined),
    notifyNotUpdatedSubscriptions: jest.fn().mockResolvedValue(undefined),
  }
}

export function createLoggerFake() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }
}

export type TestRuntime = FulfillmentRuntime & {
  vendor: jest.Mocked<VendorApi>
  marketplace: jest.Mocked<MarketplaceApi>
  notifier: jest.Mocked<Notifier>
  logger: ReturnType<typeof createLoggerFake>
}

export function createTestRuntime(
  order: Order,
  config: Partial<FulfillmentConfig> = {},
  now: Date = NOW
): TestRuntime {
  return {
    config: buildConfig(config),
    vendor: createVendorFake(),
    marketplace: createMarketplaceFake(order),
    notifier: createNotifierFake(),
    metrics: createMetricsRegistry(),
    logger: createLoggerFake(),
    now: () => now,
  }
}

/** Parsed JSON log lines written at `level`. */
export function loggedEvents(
  logger: ReturnType<typeof createLoggerFake>,
  level: "debug" | "info" | "warn" | "error"
): Array<Record<string, unknown>> {
  return logger[level].mock.calls.map((call: unknown[]) => JSON.parse(String(call[0])))
}

export function fulfillmentValue(order: Order, externalId: string): Parameter["value"] {
  return order.parameters.fulfillment.find((entry) => entry.externalId === externalId)?.value
}
