import type { FetchLike, FetchResponseLike } from "../../http"
import { LoggingNotifier, WebhookNotifier, createNotifier } from "../notifier"

const NOTICE = {
  orderId: "ORD-1000",
  productId: "PRD-1111",
  errorMessage: "1004 - Subscription inactive",
  subscriptions: [
    { subscriptionId: "VS-2", error: "1004 - Subscription inactive" },
    { subscriptionId: "VS-1" },
  ],
}

function createFetchMock(status = 200) {
  return jest
    .fn<Promise<FetchResponseLike>, Parameters<FetchLike>>()
    .mockResolvedValue({ status, text: async () => "" })
}

describe("WebhookNotifier", () => {
  it("posts the rolled back subscriptions as a card", async () => {
    const fetchMock = createFetchMock()
    const notifier = new WebhookNotifier("https://hooks.example.com/ops", { fetch: fetchMock })

    await notifier.notifyNotUpdatedSubscriptions(NOTICE)

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://hooks.example.com/ops")
    expect(JSON.parse(fetchMock.mock.calls[0]?.[1]?.body ?? "null")).toEqual({
      title: "Subscriptions not updated for order ORD-1000",
      text: [
        "Product: PRD-1111",
        "Error: 1004 - Subscription inactive",
        "The following subscriptions were rolled back or could not be updated:",
        "- VS-2: 1004 - Subscription inactive",
        "- VS-1",
      ].join("\n"),
    })
  })

  it("logs a warning when the channel refuses the card", async () => {
    const logger = { info: jest.fn(), warn: jest.fn() }
    const notifier = new WebhookNotifier("https://hooks.example.com/ops", {
      fetch: createFetchMock(500),
      logger,
    })

    await notifier.notifyException({ title: "Order fulfillment error", text: "boom" })

    expect(JSON.parse(logger.warn.mock.calls[0]?.[0])).toMatchObject({
      message: "notification.delivery_failed",
      meta: { status: 500, title: "Order fulfillment error" },
    })
  })
})

describe("createNotifier", () => {
  it("falls back to error logs without a webhook", async () => {
    const logger = { info: jest.fn(), error: jest.fn() }
    const notifier = createNotifier(undefined, { logger })

    expect(notifier).toBeInstanceOf(LoggingNotifier)

    await notifier.notifyException({ title: "Order fulfillment error", text: "boom" })

    expect(JSON.parse(logger.error.mock.calls[0]?.[0])).toMatchObject({
      level: "error",
      message: "notification.exception",
      meta: { title: "Order fulfillment error", text: "boom" },
    })
  })

  it("uses the webhook when one is configured", () => {
    expect(createNotifier("https://hooks.example.com/ops")).toBeInstanceOf(WebhookNotifier)
  })
})
