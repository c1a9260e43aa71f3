import { logEvent } from "../../modules/logging/log-event"
import type { LogTarget } from "../../modules/logging/structured-logger"
import type { NotificationMessage } from "../marketplace/types"
import { type FetchLike, resolveFetch } from "../http"

export type NotUpdatedSubscriptionsNotice = {
  orderId: string
  productId: string
  errorMessage: string
  subscriptions: Array<{ subscriptionId: string; error?: string }>
}

export interface Notifier {
  notifyException(message: NotificationMessage): Promise<void>
  notifyNotUpdatedSubscriptions(notice: NotUpdatedSubscriptionsNotice): Promise<void>
}

type NotifierRuntime = {
  fetch?: FetchLike
  logger?: LogTarget
}

function formatNotUpdated(input: NotUpdatedSubscriptionsNotice): NotificationMessage {
  const lines = input.subscriptions.map((entry) =>
    entry.error ? `- ${entry.subscriptionId}: ${entry.error}` : `- ${entry.subscriptionId}`
  )

  return {
    title: `Subscriptions not updated for order ${input.orderId}`,
    text: [
      `Product: ${input.productId}`,
      `Error: ${input.errorMessage}`,
      "The following subscriptions were rolled back or could not be updated:",
      ...lines,
    ].join("\n"),
  }
}

/** Posts `{ title, text }` cards to an incoming-webhook channel. */
export class WebhookNotifier implements Notifier {
  private readonly url: string
  private readonly fetchImpl: FetchLike
  private readonly logger?: LogTarget

  constructor(url: string, runtime: NotifierRuntime = {}) {
    this.url = url
    this.fetchImpl = resolveFetch(runtime.fetch)
    this.logger = runtime.logger
  }

  async notifyException(message: NotificationMessage): Promise<void> {
    await this.post(message)
  }

  async notifyNotUpdatedSubscriptions(
    input: NotUpdatedSubscriptionsNotice
  ): Promise<void> {
    await this.post(formatNotUpdated(input))
  }

  private async post(message: NotificationMessage): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(message),
    })

    if (response.status >= 300) {
      logEvent(
        "notification.delivery_failed",
        { status: response.status, title: message.title },
        undefined,
        { level: "warn", target: this.logger }
      )
    }
  }
}

/** Used when no webhook is configured: notifications become error log lines. */
export class LoggingNotifier implements Notifier {
  private readonly logger?: LogTarget

  constructor(logger?: LogTarget) {
    this.logger = logger
  }

  async notifyException(message: NotificationMessage): Promise<void> {
    logEvent("notification.exception", { ...message }, undefined, {
      level: "error",
      target: this.logger,
    })
  }

  async notifyNotUpdatedSubscriptions(
    input: NotUpdatedSubscriptionsNotice
  ): Promise<void> {
    logEvent("notification.subscriptions_not_updated", { ...formatNotUpdated(input) }, undefined, {
      level: "error",
      target: this.logger,
    })
  }
}

export function createNotifier(url: string | undefined, runtime: NotifierRuntime = {}): Notifier {
  return url ? new WebhookNotifier(url, runtime) : new LoggingNotifier(runtime.logger)
}
