import { RazorpayIntegrationError } from "../errors"
import { handleApiResponse } from "../normalizer"

function jsonResponse(status: number, body: unknown) {
  return {
    status,
    json: jest.fn(async () => body),
  }
}

function makeLogger() {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }
}

function getLoggedMessages(mockFn: jest.Mock): string[] {
  return mockFn.mock.calls.map((call) => {
    const parsed: unknown = JSON.parse(String(call[0]))
    return typeof parsed === "object" && parsed !== null && "message" in parsed
      ? String(parsed.message)
      : ""
  })
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }

  throw new Error("expected promise to reject")
}

describe("handleApiResponse", () => {
  it("returns the parsed body of a successful HTTP response", async () => {
    const logger = makeLogger()

    const result = await handleApiResponse(
      async () => jsonResponse(200, { id: "plink_ok_1", status: "created" }),
      {
        correlation_id: "corr_ok_1",
        endpoint: "payment_links",
        scopeOrLogger: logger,
      }
    )

    expect(result).toEqual({ id: "plink_ok_1", status: "created" })
    expect(logger.error).not.toHaveBeenCalled()
  })

  it("returns an SDK payload unchanged", async () => {
    const payment = { id: "pay_123", amount: 50000, status: "captured" }

    const result = await handleApiResponse(async () => payment, {
      correlation_id: "corr_sdk_1",
      endpoint: "payments.fetch",
      scopeOrLogger: makeLogger(),
    })

    expect(result).toBe(payment)
  })

  it("turns a gateway error body into `<code>- <description>`", async () => {
    const logger = makeLogger()

    const error = await captureRejection(
      handleApiResponse(
        async () =>
          jsonResponse(400, {
            error: {
              code: "BAD_REQUEST_ERROR",
              description: "amount must be at least INR 1.00",
            },
          }),
        {
          correlation_id: "corr_gateway_1",
          endpoint: "payment_links",
          scopeOrLogger: logger,
        }
      )
    )

    expect(error).toBeInstanceOf(RazorpayIntegrationError)
    expect(error).toMatchObject({
      code: "GATEWAY_ERROR",
      message: "BAD_REQUEST_ERROR- amount must be at least INR 1.00",
      http_status: 400,
      correlation_id: "corr_gateway_1",
      details: {
        endpoint: "payment_links",
        gateway_code: "BAD_REQUEST_ERROR",
        gateway_description: "amount must be at least INR 1.00",
      },
    })
    expect(getLoggedMessages(logger.error)).toEqual(["RAZORPAY_GATEWAY_ERROR"])
  })

  it("treats an error object in a resolved SDK payload as a gateway error", async () => {
    const error = await captureRejection(
      handleApiResponse(
        async () => ({
          statusCode: 400,
          error: {
            code: "BAD_REQUEST_ERROR",
            description: "The payment has been fully refunded already",
          },
        }),
        {
          correlation_id: "corr_gateway_2",
          endpoint: "payments.refund",
          scopeOrLogger: makeLogger(),
        }
      )
    )

    expect(error).toMatchObject({
      code: "GATEWAY_ERROR",
      message: "BAD_REQUEST_ERROR- The payment has been fully refunded already",
      http_status: 400,
    })
  })

  it("hides transport failures behind a generic message and logs the detail", async () => {
    const logger = makeLogger()
    const cause = new Error("socket hang up")

    const error = await captureRejection(
      handleApiResponse(
        async () => {
          throw cause
        },
        {
          correlation_id: "corr_transport_1",
          endpoint: "payments.fetch",
          scopeOrLogger: logger,
        }
      )
    )

    expect(error).toMatchObject({
      code: "TRANSPORT_ERROR",
      message: "Something Bad Happened !",
      http_status: 502,
      cause,
    })
    expect(logger.error).toHaveBeenCalledTimes(1)

    const logged = JSON.parse(String(logger.error.mock.calls[0]?.[0]))
    expect(logged).toEqual(
      expect.objectContaining({
        message: "RAZORPAY_TRANSPORT_ERROR",
        correlation_id: "corr_transport_1",
        error_code: "TRANSPORT_ERROR",
      })
    )
    expect(logged.meta.endpoint).toBe("payments.fetch")
    expect(logged.meta.error.message).toBe("socket hang up")
  })

  it("treats an unreadable HTTP body as a transport failure", async () => {
    const error = await captureRejection(
      handleApiResponse(
        async () => ({
          status: 502,
          json: async () => {
            throw new SyntaxError("Unexpected token < in JSON at position 0")
          },
        }),
        {
          correlation_id: "corr_transport_2",
          endpoint: "payment_links",
          scopeOrLogger: makeLogger(),
        }
      )
    )

    expect(error).toMatchObject({
      code: "TRANSPORT_ERROR",
      message: "Something Bad Happened !",
    })
  })

  it("fails on an HTTP error status even without an error body", async () => {
    const error = await captureRejection(
      handleApiResponse(async () => jsonResponse(503, {}), {
        correlation_id: "corr_status_1",
        endpoint: "customers?count=1",
        scopeOrLogger: makeLogger(),
      })
    )

    expect(error).toMatchObject({
      code: "GATEWAY_ERROR",
      message: "HTTP_ERROR- Razorpay responded with status 503",
      http_status: 503,
    })
  })

  it("rejects a payload that is not an object", async () => {
    const error = await captureRejection(
      handleApiResponse(async () => jsonResponse(200, "ok"), {
        correlation_id: "corr_payload_1",
        endpoint: "payment_links",
        scopeOrLogger: makeLogger(),
      })
    )

    expect(error).toMatchObject({
      code: "TRANSPORT_ERROR",
      message: "Something Bad Happened !",
    })
  })
})
