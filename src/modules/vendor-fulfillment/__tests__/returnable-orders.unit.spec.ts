import { createContext } from "../context"
import { StepResult } from "../pipeline"
import {
  GetReturnableOrders,
  SubmitReturnOrders,
  ValidateReturnableOrders,
  excludeReturnedCandidates,
  isWithinLastTwoWeeks,
  matchReturnableOrders,
} from "../returnable-orders"
import {
  buildLine,
  buildOrder,
  buildReturnable,
  buildVendorOrder,
  createTestRuntime,
  fulfillmentValue,
  loggedEvents,
  param,
} from "./fixtures"

const SKU = "65304578CA"

function orderIds(result: ReturnType<typeof matchReturnableOrders>): string[] {
  return result.matched ? result.orders.map((info) => info.order.orderId) : []
}

describe("matchReturnableOrders", () => {
  const candidates = [
    buildReturnable("P-1", SKU, 1),
    buildReturnable("P-2", SKU, 2),
    buildReturnable("P-4", SKU, 4),
  ]

  it("returns every order when the whole set adds up to the delta", () => {
    expect(orderIds(matchReturnableOrders(candidates, 7, { maxCandidates: 16 }))).toEqual([
      "P-1",
      "P-2",
      "P-4",
    ])
  })

  it("picks the subset whose quantities match the delta", () => {
    expect(orderIds(matchReturnableOrders(candidates, 3, { maxCandidates: 16 }))).toEqual([
      "P-1",
      "P-2",
    ])
  })

  it("reports no subset when nothing adds up", () => {
    expect(matchReturnableOrders(candidates, 8, { maxCandidates: 16 })).toEqual({
      matched: false,
      reason: "no_subset",
    })
  })

  it("needs no orders for a zero delta", () => {
    expect(matchReturnableOrders(candidates, 0, { maxCandidates: 16 })).toEqual({
      matched: true,
      orders: [],
    })
  })

  it("prefers the larger subset on equal sums", () => {
    const tied = [
      buildReturnable("A", SKU, 3),
      buildReturnable("B", SKU, 1),
      buildReturnable("C", SKU, 2),
    ]

    expect(orderIds(matchReturnableOrders(tied, 3, { maxCandidates: 16 }))).toEqual(["B", "C"])
  })

  it("takes the first combination in candidate order within one size", () => {
    const tied = [
      buildReturnable("A", SKU, 2),
      buildReturnable("B", SKU, 2),
      buildReturnable("C", SKU, 2),
    ]

    expect(orderIds(matchReturnableOrders(tied, 4, { maxCandidates: 16 }))).toEqual(["A", "B"])
  })

  it("only tries the full set and single orders above the candidate limit", () => {
    expect(orderIds(matchReturnableOrders(candidates, 4, { maxCandidates: 2 }))).toEqual(["P-4"])
    expect(orderIds(matchReturnableOrders(candidates, 7, { maxCandidates: 2 }))).toEqual([
      "P-1",
      "P-2",
      "P-4",
    ])
    expect(matchReturnableOrders(candidates, 3, { maxCandidates: 2 })).toEqual({
      matched: false,
      reason: "too_many_candidates",
    })
  })
})

describe("excludeReturnedCandidates", () => {
  it("drops candidates referenced by an in-flight return", () => {
    const candidates = [buildReturnable("P-1", SKU, 1), buildReturnable("P-2", SKU, 2)]
    const returns = [
      buildVendorOrder({ orderId: "R-1", orderType: "RETURN", referenceOrderId: "P-1" }),
    ]

    expect(excludeReturnedCandidates(candidates, returns).map((info) => info.order.orderId)).toEqual([
      "P-2",
    ])
  })
})

describe("isWithinLastTwoWeeks", () => {
  it("compares today against the anniversary minus fourteen days", () => {
    const runtime = createTestRuntime(buildOrder())

    // today is 2026-03-10
    expect(isWithinLastTwoWeeks(runtime, "2026-03-24")).toBe(true)
    expect(isWithinLastTwoWeeks(runtime, "2026-03-25")).toBe(false)
  })
})

function downsizeOrder(options: { quantity: number; oldQuantity: number; cotermDate?: string }) {
  return buildOrder({
    type: "Change",
    customerId: "CUS-1",
    lines: [buildLine({ sku: SKU, quantity: options.quantity, oldQuantity: options.oldQuantity })],
    fulfillment: [param("cotermDate", options.cotermDate ?? "2026-09-01")],
  })
}

describe("GetReturnableOrders", () => {
  it("stores the matched orders for the downsized SKU", async () => {
    const order = downsizeOrder({ quantity: 7, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    runtime.vendor.getReturnableOrdersBySku.mockResolvedValue([
      buildReturnable("P-1", SKU, 1),
      buildReturnable("P-2", SKU, 2),
      buildReturnable("P-4", SKU, 4),
    ])

    const result = await new GetReturnableOrders().run(runtime, context)

    expect(result).toBe(StepResult.NEXT)
    expect(runtime.vendor.getReturnableOrdersBySku).toHaveBeenCalledWith("CUS-1", SKU, "2026-09-01")
    expect(context.vendorReturnableOrders[SKU]?.map((info) => info.order.orderId)).toEqual([
      "P-1",
      "P-2",
    ])
  })

  it("subtracts quantities already being returned from the delta", async () => {
    const order = downsizeOrder({ quantity: 3, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    context.vendorReturnOrders[SKU] = [
      buildVendorOrder({
        orderId: "R-1",
        orderType: "RETURN",
        referenceOrderId: "P-4",
        status: "1002",
        lineItems: [{ extLineItemNumber: 1, offerId: `${SKU}CA01A12`, quantity: 4 }],
      }),
    ]
    runtime.vendor.getReturnableOrdersBySku.mockResolvedValue([
      buildReturnable("P-1", SKU, 1),
      buildReturnable("P-2", SKU, 2),
      buildReturnable("P-4", SKU, 4),
    ])

    await new GetReturnableOrders().run(runtime, context)

    expect(context.vendorReturnableOrders[SKU]?.map((info) => info.order.orderId)).toEqual([
      "P-1",
      "P-2",
    ])
  })

  it("marks the SKU unmatched when no subset fits", async () => {
    const order = downsizeOrder({ quantity: 2, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    runtime.vendor.getReturnableOrdersBySku.mockResolvedValue([buildReturnable("P-1", SKU, 1)])

    await new GetReturnableOrders().run(runtime, context)

    expect(context.vendorReturnableOrders[SKU]).toBeNull()
    const unmatched = loggedEvents(runtime.logger, "info").find(
      (entry) => entry.message === "returnable_orders.unmatched"
    )
    expect(unmatched?.meta).toEqual({ sku: SKU, delta: 8, candidates: 1, reason: "no_subset" })
  })

  it("skips the lookup in the last two weeks before the anniversary", async () => {
    const order = downsizeOrder({ quantity: 7, oldQuantity: 10, cotermDate: "2026-03-20" })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")

    await new GetReturnableOrders().run(runtime, context)

    expect(runtime.vendor.getReturnableOrdersBySku).not.toHaveBeenCalled()
    expect(context.vendorReturnableOrders).toEqual({})
  })
})

describe("ValidateReturnableOrders", () => {
  it("fails the order listing the unmatched SKUs", async () => {
    const order = downsizeOrder({ quantity: 2, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    context.vendorReturnableOrders[SKU] = null

    const result = await new ValidateReturnableOrders().run(runtime, context)

    expect(result).toBe(StepResult.HALT)
    expect(runtime.marketplace.failOrder).toHaveBeenCalledWith(
      "ORD-1000",
      expect.objectContaining({
        error: {
          id: "FUL0008",
          message: `No vendor orders that match the desired quantity delta have been found for the following SKUs: ${SKU}`,
        },
      })
    )
  })

  it("only annotates the draft in validating mode", async () => {
    const order = downsizeOrder({ quantity: 2, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    context.vendorReturnableOrders[SKU] = null

    const result = await new ValidateReturnableOrders("validating").run(runtime, context)

    expect(result).toBe(StepResult.HALT)
    expect(context.validationSucceeded).toBe(false)
    expect(context.order.error?.id).toBe("FUL0008")
    expect(runtime.marketplace.failOrder).not.toHaveBeenCalled()
  })
})

describe("SubmitReturnOrders", () => {
  it("creates one return per matched order and waits while they are pending", async () => {
    const order = downsizeOrder({ quantity: 7, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    const first = buildReturnable("P-1", SKU, 1)
    const second = buildReturnable("P-2", SKU, 2)
    context.vendorReturnableOrders[SKU] = [first, second]
    runtime.vendor.createReturnOrder
      .mockResolvedValueOnce(buildVendorOrder({ orderId: "R-1", orderType: "RETURN", status: "1002" }))
      .mockResolvedValueOnce(buildVendorOrder({ orderId: "R-2", orderType: "RETURN", status: "1002" }))

    const result = await new SubmitReturnOrders().run(runtime, context)

    expect(result).toBe(StepResult.HALT)
    expect(runtime.vendor.createReturnOrder).toHaveBeenNthCalledWith(1, {
      customerId: "CUS-1",
      orderId: "ORD-1000",
      currency: "USD",
      returningOrder: first.order,
      returningLine: first.line,
    })
    expect(runtime.vendor.createReturnOrder).toHaveBeenCalledTimes(2)
    expect(fulfillmentValue(context.order, "retryCount")).toBe("1")
  })

  it("does not return an order twice and continues once every return is processed", async () => {
    const order = downsizeOrder({ quantity: 7, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    context.vendorReturnableOrders[SKU] = [buildReturnable("P-1", SKU, 1)]
    context.vendorReturnOrders[SKU] = [
      buildVendorOrder({
        orderId: "R-1",
        orderType: "RETURN",
        referenceOrderId: "P-1",
        status: "1000",
      }),
    ]

    const result = await new SubmitReturnOrders().run(runtime, context)

    expect(result).toBe(StepResult.NEXT)
    expect(runtime.vendor.createReturnOrder).not.toHaveBeenCalled()
  })

  it("fails the order when a return ends in an unrecoverable status", async () => {
    const order = downsizeOrder({ quantity: 7, oldQuantity: 10 })
    const runtime = createTestRuntime(order)
    const context = createContext(order, "change")
    context.vendorReturnOrders[SKU] = [
      buildVendorOrder({ orderId: "R-1", orderType: "RETURN", status: "1008" }),
    ]

    const result = await new SubmitReturnOrders().run(runtime, context)

    expect(result).toBe(StepResult.HALT)
    expect(context.order.status).toBe("Failed")
    expect(context.order.error).toEqual({ id: "FUL0004", message: "Order has been cancelled." })
  })
})
