import { validationError } from "../../../modules/observability/errors"
import type { validate } from "../../../modules/vendor-fulfillment/validate"
import { buildOrder, createTestRuntime } from "../../../modules/vendor-fulfillment/__tests__/fixtures"
import { type JsonResponse, createValidateOrderRoute } from "../validate/route"

type RecordedResponse = JsonResponse & {
  statusCode: number
  body: unknown
}

function makeRes() {
  const res: RecordedResponse = {
    statusCode: 200,
    body: undefined,
    status: jest.fn((code: number) => {
      res.statusCode = code
      return res
    }),
    json: jest.fn((payload: unknown) => {
      res.body = payload
      return res
    }),
  }

  return res
}

function setup() {
  const order = buildOrder()
  const runtime = createTestRuntime(order)
  const validateMock = jest.fn<ReturnType<typeof validate>, Parameters<typeof validate>>()
  const route = createValidateOrderRoute({
    createRuntime: () => runtime,
    validate: validateMock,
  })
  const logger = { info: jest.fn(), error: jest.fn() }

  return { order, runtime, validateMock, route, scope: { resolve: jest.fn(() => logger) }, logger }
}

describe("vendor order validate route", () => {
  it("returns the annotated draft", async () => {
    const { order, runtime, validateMock, route, scope } = setup()
    validateMock.mockResolvedValue({ hasErrors: false, order })
    const res = makeRes()

    await route({ body: order, scope }, res)

    expect(validateMock).toHaveBeenCalledWith(runtime, order)
    expect(res.status).toHaveBeenCalledWith(200)
    expect(res.body).toEqual({ hasErrors: false, order })
  })

  it("rejects bodies that are not orders", async () => {
    const { validateMock, route, scope } = setup()
    const res = makeRes()

    await route({ body: { id: "ORD-1000" }, scope }, res)

    expect(validateMock).not.toHaveBeenCalled()
    expect(res.statusCode).toBe(400)
    expect(res.body).toMatchObject({
      code: "ORDER_DATA_INVALID",
      message: "Request body is not a valid order.",
    })
  })

  it("maps validation errors to 400 and logs them", async () => {
    const { order, validateMock, route, scope, logger } = setup()
    validateMock.mockRejectedValue(
      validationError("UNSUPPORTED_ORDER_TYPE", 'Order type "Upgrade" is not supported.')
    )
    const res = makeRes()

    await route({ body: order, scope }, res)

    expect(res.statusCode).toBe(400)
    expect(res.body).toEqual({
      code: "UNSUPPORTED_ORDER_TYPE",
      message: 'Order type "Upgrade" is not supported.',
    })
    expect(JSON.parse(logger.error.mock.calls[0]?.[0])).toMatchObject({
      message: "vendor_order.validation_failed",
      error_code: "UNSUPPORTED_ORDER_TYPE",
      meta: { order_id: "ORD-1000" },
    })
  })

  it("answers 500 for unexpected failures", async () => {
    const { order, validateMock, route, scope } = setup()
    validateMock.mockRejectedValue(new Error("vendor down"))
    const res = makeRes()

    await route({ body: order, scope }, res)

    expect(res.statusCode).toBe(500)
    expect(res.body).toEqual({ code: "INTERNAL_ERROR", message: "vendor down" })
  })
})
