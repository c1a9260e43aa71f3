import { logEvent } from "../../modules/logging/log-event"
import type { LogTarget } from "../../modules/logging/structured-logger"
import {
  type FetchLike,
  type FetchResponseLike,
  type HttpMethod,
  isObject,
  parseBody,
  readText,
  resolveFetch,
} from "../http"
import { MarketplaceApiError } from "./errors"
import {
  type Agreement,
  type Licensee,
  type Order,
  type OrderError,
  type OrderSubscription,
  type OrderUpdate,
  type ParameterBag,
  type ProductItem,
  type SubscriptionCreate,
  type SubscriptionParametersUpdate,
  type Template,
  agreementSchema,
  licenseeSchema,
  orderListSchema,
  orderSchema,
  orderSubscriptionSchema,
  productItemListSchema,
  templateSchema,
} from "./types"

/** Operations the fulfillment pipeline needs from the marketplace platform. */
export interface MarketplaceApi {
  getOrder(orderId: string): Promise<Order>
  listOrders(filter: { status: string; productIds: string[] }): Promise<Order[]>
  updateOrder(orderId: string, update: OrderUpdate): Promise<Order>
  completeOrder(orderId: string, input: { templateId?: string; parameters: ParameterBag }): Promise<Order>
  failOrder(orderId: string, input: { reason: string; error?: OrderError; parameters: ParameterBag }): Promise<Order>
  queryOrder(orderId: string, input: { templateId?: string; parameters: ParameterBag }): Promise<Order>
  createSubscription(orderId: string, subscription: SubscriptionCreate): Promise<OrderSubscription>
  updateSubscription(
    orderId: string,
    subscriptionId: string,
    update: SubscriptionParametersUpdate
  ): Promise<OrderSubscription>
  getOrderSubscriptionByExternalId(
    orderId: string,
    vendorSubscriptionId: string
  ): Promise<OrderSubscription | undefined>
  getAgreement(agreementId: string): Promise<Agreement>
  updateAgreement(
    agreementId: string,
    update: { externalIds?: { vendor?: string }; parameters?: ParameterBag }
  ): Promise<Agreement>
  getLicensee(licenseeId: string): Promise<Licensee>
  getProductTemplateOrDefault(
    productId: string,
    status: string,
    name?: string
  ): Promise<Template | undefined>
  getProductItemsBySkus(productId: string, skus: string[]): Promise<ProductItem[]>
}

export type MarketplaceClientConfig = {
  baseUrl: string
  token: string
}

export type MarketplaceClientRuntime = {
  fetch?: FetchLike
  logger?: LogTarget
}

const PAGE_LIMIT = 100

function rqlList(values: string[]): string {
  return `(${values.join(",")})`
}

export class MarketplaceClient implements MarketplaceApi {
  private readonly config: MarketplaceClientConfig
  private readonly fetchImpl: FetchLike
  private readonly logger?: LogTarget

  constructor(config: MarketplaceClientConfig, runtime: MarketplaceClientRuntime = {}) {
    this.config = config
    this.fetchImpl = resolveFetch(runtime.fetch)
    this.logger = runtime.logger
  }

  async getOrder(orderId: string): Promise<Order> {
    const body = await this.request("GET", `/v1/commerce/orders/${orderId}?select=subscriptions,parameters,agreement`)
    return orderSchema.parse(body)
  }

  async listOrders(filter: { status: string; productIds: string[] }): Promise<Order[]> {
    const conditions = [`eq(status,${filter.status})`]
    if (filter.productIds.length) {
      conditions.push(`in(product.id,${rqlList(filter.productIds)})`)
    }
    const rql = `and(${conditions.join(",")})`

    const orders: Order[] = []
    let offset = 0
    for (;;) {
      const body = await this.request(
        "GET",
        `/v1/commerce/orders?${rql}&select=subscriptions,parameters,agreement&order=events.created.at&limit=${PAGE_LIMIT}&offset=${offset}`
      )
      const page = orderListSchema.parse(body)
      orders.push(...page.data)

      const pagination = page.$meta?.pagination
      if (!pagination || pagination.offset + pagination.limit >= pagination.total) {
        return orders
      }
      offset = pagination.offset + pagination.limit
    }
  }

  async updateOrder(orderId: string, update: OrderUpdate): Promise<Order> {
    const body = await this.request("PUT", `/v1/commerce/orders/${orderId}`, update)
    return orderSchema.parse(body)
  }

  async completeOrder(
    orderId: string,
    input: { templateId?: string; parameters: ParameterBag }
  ): Promise<Order> {
    const body = await this.request("POST", `/v1/commerce/orders/${orderId}/complete`, {
      template: input.templateId ? { id: input.templateId } : undefined,
      parameters: input.parameters,
    })
    return orderSchema.parse(body)
  }

  async failOrder(
    orderId: string,
    input: { reason: string; error?: OrderError; parameters: ParameterBag }
  ): Promise<Order> {
    const body = await this.request("POST", `/v1/commerce/orders/${orderId}/fail`, {
      statusNotes: input.error ?? { id: "", message: input.reason },
      parameters: input.parameters,
    })
    return orderSchema.parse(body)
  }

  async queryOrder(
    orderId: string,
    input: { templateId?: string; parameters: ParameterBag }
  ): Promise<Order> {
    const body = await this.request("POST", `/v1/commerce/orders/${orderId}/query`, {
      template: input.templateId ? { id: input.templateId } : undefined,
      parameters: input.parameters,
    })
    return orderSchema.parse(body)
  }

  async createSubscription(
    orderId: string,
    subscription: SubscriptionCreate
  ): Promise<OrderSubscription> {
    const body = await this.request(
      "POST",
      `/v1/commerce/orders/${orderId}/subscriptions`,
      subscription
    )
    return orderSubscriptionSchema.parse(body)
  }

  async updateSubscription(
    orderId: string,
    subscriptionId: string,
    update: SubscriptionParametersUpdate
  ): Promise<OrderSubscription> {
    const body = await this.request(
      "PUT",
      `/v1/commerce/orders/${orderId}/subscriptions/${subscriptionId}`,
      update
    )
    return orderSubscriptionSchema.parse(body)
  }

  async getOrderSubscriptionByExternalId(
    orderId: string,
    vendorSubscriptionId: string
  ): Promise<OrderSubscription | undefined> {
    const body = await this.request(
      "GET",
      `/v1/commerce/orders/${orderId}/subscriptions?eq(externalIds.vendor,${vendorSubscriptionId})&limit=1`
    )
    const data = isObject(body) && Array.isArray(body.data) ? body.data : []
    return data.length ? orderSubscriptionSchema.parse(data[0]) : undefined
  }

  async getAgreement(agreementId: string): Promise<Agreement> {
    const body = await this.request(
      "GET",
      `/v1/commerce/agreements/${agreementId}?select=subscriptions,parameters,lines`
    )
    return agreementSchema.parse(body)
  }

  async updateAgreement(
    agreementId: string,
    update: { externalIds?: { vendor?: string }; parameters?: ParameterBag }
  ): Promise<Agreement> {
    const body = await this.request("PUT", `/v1/commerce/agreements/${agreementId}`, update)
    return agreementSchema.parse(body)
  }

  async getLicensee(licenseeId: string): Promise<Licensee> {
    const body = await this.request("GET", `/v1/accounts/licensees/${licenseeId}`)
    return licenseeSchema.parse(body)
  }

  /**
   * Template named `name` for the given order status, falling back to the
   * product's default template for that status.
   */
  async getProductTemplateOrDefault(
    productId: string,
    status: string,
    name?: string
  ): Promise<Template | undefined> {
    const statusFilter = `eq(type,Order${status})`
    const nameFilter = name ? `or(eq(default,true),eq(name,${encodeURIComponent(name)}))` : "eq(default,true)"
    const body = await this.request(
      "GET",
      `/v1/catalog/products/${productId}/templates?and(${statusFilter},${nameFilter})&limit=2`
    )

    const data = isObject(body) && Array.isArray(body.data) ? body.data : []
    const templates = data.map((entry) => templateSchema.parse(entry))
    return (name ? templates.find((template) => template.name === name) : undefined) ??
      templates.find((template) => template.default) ??
      templates[0]
  }

  async getProductItemsBySkus(productId: string, skus: string[]): Promise<ProductItem[]> {
    if (!skus.length) {
      return []
    }

    const body = await this.request(
      "GET",
      `/v1/catalog/items?and(eq(product.id,${productId}),in(externalIds.vendor,${rqlList(skus)}))&limit=${PAGE_LIMIT}`
    )
    return productItemListSchema.parse(body).data
  }

  private async request(method: HttpMethod, path: string, payload?: unknown): Promise<unknown> {
    let response: FetchResponseLike
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}${path}`, {
        method,
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.config.token}`,
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      })
    } catch (error) {
      throw new MarketplaceApiError({
        status: 0,
        title: "Network error",
        detail: error instanceof Error ? error.message : undefined,
        cause: error,
      })
    }

    const body = parseBody(await response.text())
    if (response.status < 300) {
      return body
    }

    const error = new MarketplaceApiError({
      status: response.status,
      title: isObject(body) ? readText(body.title) || "Request failed" : "Request failed",
      detail: isObject(body) ? readText(body.detail) || readText(body.message) : undefined,
    })

    logEvent(
      "marketplace.api.error",
      { method, path: path.split("?")[0], status: response.status, title: error.title },
      undefined,
      { level: "warn", target: this.logger, error_code: error.code }
    )
    throw error
  }
}
