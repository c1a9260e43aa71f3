import { isAppError } from "../../observability/errors"
import { fulfill, selectFlow } from "../fulfill"
import { resolveOrderType } from "../order-type"
import { validate } from "../validate"
import {
  buildLine,
  buildOrder,
  buildReturnable,
  buildVendorSubscription,
  createTestRuntime,
  loggedEvents,
  param,
} from "./fixtures"

describe("resolveOrderType", () => {
  it("maps marketplace order types onto flows", () => {
    expect(resolveOrderType(buildOrder({ type: "Purchase" }))).toBe("purchase")
    expect(resolveOrderType(buildOrder({ type: "Change" }))).toBe("change")
    expect(resolveOrderType(buildOrder({ type: "Termination" }))).toBe("termination")
    expect(resolveOrderType(buildOrder({ type: "Configuration" }))).toBe("configuration")
  })

  it("tells transfers and reseller changes apart by agreement type", () => {
    expect(
      resolveOrderType(buildOrder({ ordering: [param("agreementType", "Migrate")] }))
    ).toBe("transfer")
    expect(
      resolveOrderType(buildOrder({ ordering: [param("agreementType", "Transfer")] }))
    ).toBe("reseller_change")
    expect(resolveOrderType(buildOrder({ ordering: [param("agreementType", "New")] }))).toBe(
      "purchase"
    )
  })

  it("rejects unknown order types", () => {
    let thrown: unknown
    try {
      resolveOrderType(buildOrder({ type: "Upgrade" }))
    } catch (error) {
      thrown = error
    }

    expect(isAppError(thrown)).toBe(true)
    expect(thrown).toMatchObject({
      code: "UNSUPPORTED_ORDER_TYPE",
      category: "validation",
      message: 'Order type "Upgrade" is not supported.',
    })
  })
})

describe("selectFlow", () => {
  it("names each flow after its order type", () => {
    expect(selectFlow("transfer").name).toBe("fulfillment_transfer")
    expect(selectFlow("reseller_change").name).toBe("fulfillment_reseller_change")
    expect(selectFlow("termination").name).toBe("fulfillment_termination")
  })
})

describe("fulfill", () => {
  function configurationOrder() {
    return buildOrder({
      type: "Configuration",
      customerId: "CUS-1",
      subscriptions: [
        {
          id: "SUB-1",
          autoRenew: true,
          externalIds: { vendor: "VS-1" },
          lines: [{ id: "ALI-0001", quantity: 10 }],
        },
      ],
      fulfillment: [param("dueDate", "2026-04-09")],
    })
  }

  it("runs the flow for the order type and logs the outcome", async () => {
    const order = configurationOrder()
    const runtime = createTestRuntime(order)
    runtime.vendor.getSubscription.mockResolvedValue(
      buildVendorSubscription({ subscriptionId: "VS-1", offerId: "65304578CA01A12" })
    )

    const result = await fulfill(runtime, order)

    expect(result).toEqual({ completed: true, stepsRun: 7 })
    // the subscription already renews 10 seats automatically
    expect(runtime.vendor.updateSubscription).not.toHaveBeenCalled()
    expect(runtime.marketplace.getProductTemplateOrDefault).toHaveBeenLastCalledWith(
      "PRD-1111",
      "Completed",
      "Auto-renewal enabled"
    )
    const finished = loggedEvents(runtime.logger, "info").find(
      (entry) => entry.message === "fulfillment.run.finished"
    )
    expect(finished).toMatchObject({
      workflow_name: "fulfillment_configuration",
      order_id: "ORD-1000",
      meta: { completed: true, halted_at: null, steps_run: 7 },
    })
  })

  it("notifies operations about an unexpected failure and rethrows it", async () => {
    const order = configurationOrder()
    const runtime = createTestRuntime(order)
    runtime.vendor.getCustomer.mockRejectedValue(new Error("vendor down"))

    await expect(fulfill(runtime, order)).rejects.toThrow("vendor down")

    expect(runtime.notifier.notifyException).toHaveBeenCalledTimes(1)
    const message = runtime.notifier.notifyException.mock.calls[0]?.[0]
    expect(message?.title).toBe("Order fulfillment error in SetupContext")
    expect(
      message?.text.startsWith("Order ORD-1000 (configuration) failed in step SetupContext.\n\nError: vendor down")
    ).toBe(true)
    expect(loggedEvents(runtime.logger, "error")[0]).toMatchObject({
      message: "fulfillment.step.failed",
      step_name: "SetupContext",
      error_code: "INTERNAL_ERROR",
    })
  })
  it("rethrows the step failure when the operations notice fails too", async () => {
    const order = configurationOrder()
    const runtime = createTestRuntime(order)
    runtime.vendor.getCustomer.mockRejectedValue(new Error("vendor down"))
    runtime.notifier.notifyException.mockRejectedValue(new Error("webhook down"))

    await expect(fulfill(runtime, order)).rejects.toThrow("vendor down")

    expect(loggedEvents(runtime.logger, "warn")).toContainEqual(
      expect.objectContaining({
        message: "notification.failed",
        step_name: "SetupContext",
        error_code: "INTERNAL_ERROR",
        meta: { message: "webhook down" },
      })
    )
  })
})

describe("validate", () => {
  it("flags missing customer data on the draft without touching the order", async () => {
    const order = buildOrder({ lines: [buildLine({ sku: "65304578CA", quantity: 5 })] })
    const runtime = createTestRuntime(order)

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(true)
    const companyName = result.order.parameters.ordering.find(
      (entry) => entry.externalId === "companyName"
    )
    expect(companyName?.error?.id).toBe("FUL0024")
    expect(runtime.marketplace.queryOrder).not.toHaveBeenCalled()
    expect(runtime.marketplace.updateOrder).not.toHaveBeenCalled()
  })

  it("clears errors left by an earlier validation", async () => {
    const order = buildOrder({
      lines: [buildLine({ sku: "65304578CA", quantity: 5 })],
      ordering: [
        { externalId: "companyName", value: "Example Studio", error: { id: "FUL0024", message: "old" } },
        param("address", { country: "US" }),
        param("contact", { email: "ada@example.com" }),
      ],
    })
    const runtime = createTestRuntime(order)

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(false)
    expect(result.order.error).toBeNull()
    expect(result.order.parameters.ordering.map((entry) => entry.error)).toEqual([null, null, null])
  })

  it("accepts order types without draft checks as they are", async () => {
    const order = buildOrder({ type: "Configuration", customerId: "CUS-1" })
    const runtime = createTestRuntime(order)

    await expect(validate(runtime, order)).resolves.toEqual({ hasErrors: false, order })
  })

  it("flags a termination whose quantity no vendor order can return", async () => {
    const order = buildOrder({
      type: "Termination",
      customerId: "CUS-1",
      lines: [buildLine({ sku: "65304578CA", quantity: 0, oldQuantity: 5 })],
    })
    const runtime = createTestRuntime(order)

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(true)
    expect(result.order.error).toEqual({
      id: "FUL0026",
      message:
        "Cannot terminate the following SKUs because no vendor orders within the cancellation window match the quantity: 65304578CA",
    })
    expect(runtime.vendor.getReturnableOrdersBySku).toHaveBeenCalledWith("CUS-1", "65304578CA", "2026-09-01")
    expect(runtime.marketplace.failOrder).not.toHaveBeenCalled()
  })

  it("flags a termination drafted inside the renewal window", async () => {
    const order = buildOrder({
      type: "Termination",
      customerId: "CUS-1",
      lines: [buildLine({ sku: "65304578CA", quantity: 0, oldQuantity: 5 })],
    })
    const runtime = createTestRuntime(order, {}, new Date("2026-08-31T12:00:00.000Z"))

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(true)
    expect(result.order.error).toEqual({
      id: "FUL0017",
      message: "The order cannot be processed in the 24 hours before the anniversary date 2026-09-01.",
    })
    expect(runtime.vendor.getReturnableOrdersBySku).not.toHaveBeenCalled()
  })

  it("flags a change whose downsize no vendor order can return", async () => {
    const order = buildOrder({
      type: "Change",
      customerId: "CUS-1",
      lines: [buildLine({ sku: "65304578CA", quantity: 4, oldQuantity: 10 })],
    })
    const runtime = createTestRuntime(order)
    runtime.vendor.getReturnableOrdersBySku.mockResolvedValue([buildReturnable("VO-1", "65304578CA", 3)])

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(true)
    expect(result.order.error).toEqual({
      id: "FUL0008",
      message:
        "No vendor orders that match the desired quantity delta have been found for the following SKUs: 65304578CA",
    })
    expect(runtime.vendor.createPreviewOrder).not.toHaveBeenCalled()
  })

  it("mirrors the membership items onto a transfer draft", async () => {
    const order = buildOrder({
      ordering: [param("agreementType", "Migrate"), param("membershipId", "MEM-1")],
      lines: [
        buildLine({ id: "ALI-0001", sku: "65304578CA", quantity: 5 }),
        buildLine({ id: "ALI-0002", sku: "65301111CA", quantity: 2 }),
      ],
    })
    const runtime = createTestRuntime(order)
    runtime.vendor.previewTransfer.mockResolvedValue({
      items: [
        { offerId: "65304578CA01A12", quantity: 7 },
        { offerId: "65309999CA01A12", quantity: 3 },
      ],
    })
    runtime.marketplace.getProductItemsBySkus.mockResolvedValue([
      { id: "ITM-A", name: "Seat A", externalIds: { vendor: "65304578CA" } },
      { id: "ITM-B", name: "Seat B", externalIds: { vendor: "65309999CA" } },
    ])
    runtime.vendor.getSkuPrices.mockResolvedValue({ "65309999CA01A12": 12.5 })

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(false)
    expect(runtime.marketplace.getProductItemsBySkus).toHaveBeenCalledWith("PRD-1111", [
      "65304578CA",
      "65309999CA",
    ])
    expect(runtime.vendor.getSkuPrices).toHaveBeenCalledWith({
      currency: "USD",
      skus: ["65304578CA01A12", "65309999CA01A12"],
    })
    expect(result.order.lines).toEqual([
      buildLine({ id: "ALI-0001", sku: "65304578CA", quantity: 7 }),
      {
        id: "",
        quantity: 3,
        oldQuantity: 0,
        item: { id: "ITM-B", name: "Seat B", externalIds: { vendor: "65309999CA" } },
        price: { unitPP: 12.5 },
      },
    ])
    expect(runtime.vendor.createTransfer).not.toHaveBeenCalled()
  })

  it("flags a transfer draft whose membership has nothing to transfer", async () => {
    const order = buildOrder({
      ordering: [param("agreementType", "Migrate"), param("membershipId", "MEM-1")],
    })
    const runtime = createTestRuntime(order)
    runtime.vendor.previewTransfer.mockResolvedValue({ items: [] })

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(true)
    const membership = result.order.parameters.ordering.find((entry) => entry.externalId === "membershipId")
    expect(membership?.error).toEqual({
      id: "FUL0027",
      message: "The membership MEM-1 has no items that can be transferred.",
    })
    expect(runtime.marketplace.queryOrder).not.toHaveBeenCalled()
  })

  it("lists the account's items on a reseller change draft", async () => {
    const order = buildOrder({
      ordering: [
        param("agreementType", "Transfer"),
        param("changeResellerCode", "CODE-1"),
        param("changeResellerAdminEmail", "admin@example.com"),
      ],
    })
    const runtime = createTestRuntime(order)
    runtime.vendor.resellerChangeRequest.mockResolvedValue({
      transferId: "TR-P",
      status: "1002",
      approval: { expiry: "2026-04-01T00:00:00Z" },
      lineItems: [{ extLineItemNumber: 1, offerId: "65304578CA01A12", quantity: 4 }],
    })
    runtime.marketplace.getProductItemsBySkus.mockResolvedValue([
      { id: "ITM-A", name: "Seat A", externalIds: { vendor: "65304578CA" } },
    ])

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(false)
    expect(runtime.vendor.resellerChangeRequest).toHaveBeenCalledWith({
      action: "PREVIEW",
      orderId: "ORD-1000",
      approvalCode: "CODE-1",
      adminEmail: "admin@example.com",
      resellerId: "SEL-1000",
    })
    expect(result.order.lines).toEqual([
      {
        id: "",
        quantity: 4,
        oldQuantity: 0,
        item: { id: "ITM-A", name: "Seat A", externalIds: { vendor: "65304578CA" } },
        price: { unitPP: 0 },
      },
    ])
  })

  it("flags an expired reseller change code", async () => {
    const order = buildOrder({
      ordering: [
        param("agreementType", "Transfer"),
        param("changeResellerCode", "CODE-1"),
        param("changeResellerAdminEmail", "admin@example.com"),
      ],
    })
    const runtime = createTestRuntime(order)
    runtime.vendor.resellerChangeRequest.mockResolvedValue({
      transferId: "TR-P",
      status: "1002",
      approval: { expiry: "2026-03-01T00:00:00Z" },
      lineItems: [{ extLineItemNumber: 1, offerId: "65304578CA01A12", quantity: 4 }],
    })

    const result = await validate(runtime, order)

    expect(result.hasErrors).toBe(true)
    const code = result.order.parameters.ordering.find((entry) => entry.externalId === "changeResellerCode")
    expect(code?.error).toEqual({
      id: "FUL0029",
      message: "The reseller change code CODE-1 cannot be used: the code expired on 2026-03-01",
    })
    expect(runtime.marketplace.getProductItemsBySkus).not.toHaveBeenCalled()
  })
})
