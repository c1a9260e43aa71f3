export class MarketplaceApiError extends Error {
  code = "MARKETPLACE_API_ERROR"
  status: number
  title: string
  detail: string

  constructor(input: { status: number; title: string; detail?: string; cause?: unknown }) {
    super(
      input.detail ? `${input.status} ${input.title} - ${input.detail}` : `${input.status} ${input.title}`,
      input.cause === undefined ? undefined : { cause: input.cause }
    )
    this.name = "MarketplaceApiError"
    this.status = input.status
    this.title = input.title
    this.detail = input.detail ?? ""
  }
}

export function isMarketplaceApiError(error: unknown): error is MarketplaceApiError {
  return error instanceof MarketplaceApiError
}
