import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import { GET } from "../payment-status/route"

const VALID_SIGNATURE =
  "6d58d55468f718f4c4882bd85e74879383a674b7e1a3432681f12f034a993c66"

const ENV_KEYS = ["PAYMENTS_MODE", "RAZORPAY_KEY_ID", "RAZORPAY_KEY_SECRET"] as const

function makeRes() {
  const json = jest.fn((body: unknown) => body)
  const status = jest.fn((_code: number) => ({ json }))
  const setHeader = jest.fn((_name: string, _value: string) => undefined)

  return { status, json, setHeader }
}

function makeScope() {
  const logger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }

  return {
    logger,
    scope: {
      resolve: jest.fn((key: string): unknown =>
        key === ContainerRegistrationKeys.LOGGER ? logger : undefined
      ),
    },
  }
}

function makeQuery(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    razorpay_payment_id: "pay_1",
    razorpay_payment_link_id: "plink_1",
    razorpay_payment_link_reference_id: "ref_1",
    razorpay_payment_link_status: "paid",
    razorpay_signature: VALID_SIGNATURE,
    ...overrides,
  }
}

function loggedMessage(mockFn: jest.Mock): string {
  return String(JSON.parse(String(mockFn.mock.calls[0]?.[0])).message)
}

describe("GET /razorpay/payment-status", () => {
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {}

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key]
    }

    process.env.PAYMENTS_MODE = "test"
    process.env.RAZORPAY_KEY_ID = "rzp_test_key"
    process.env.RAZORPAY_KEY_SECRET = "test-secret"
  })

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key]
      if (value === undefined) {
        delete process.env[key]
      } else {
        process.env[key] = value
      }
    }
  })

  it("confirms a correctly signed callback", async () => {
    const res = makeRes()
    const { scope, logger } = makeScope()

    await GET(
      {
        query: makeQuery(),
        headers: { "x-correlation-id": "corr_status_ok" },
        scope,
      },
      res
    )

    expect(res.setHeader).toHaveBeenCalledWith("x-correlation-id", "corr_status_ok")
    expect(res.status).toHaveBeenCalledWith(200)
    expect(res.json).toHaveBeenCalledWith({
      verified: true,
      status: "paid",
      payment_id: "pay_1",
      payment_link_id: "plink_1",
      reference_id: "ref_1",
    })
    expect(JSON.parse(String(logger.info.mock.calls[0]?.[0]))).toEqual(
      expect.objectContaining({
        message: "RAZORPAY_PAYMENT_STATUS_VERIFIED",
        correlation_id: "corr_status_ok",
        operation: "payment_link.callback",
        payment_link_id: "plink_1",
        payment_id: "pay_1",
        meta: { status: "paid" },
      })
    )
  })

  it("rejects a tampered status", async () => {
    const res = makeRes()
    const { scope, logger } = makeScope()

    await GET(
      {
        query: makeQuery({ razorpay_payment_link_status: "cancelled" }),
        headers: {},
        scope,
      },
      res
    )

    expect(res.status).toHaveBeenCalledWith(400)
    expect(res.json).toHaveBeenCalledWith({
      verified: false,
      error: "Razorpay Payment Signature Verification Failed",
    })
    expect(loggedMessage(logger.warn)).toBe("RAZORPAY_PAYMENT_STATUS_REJECTED")
  })

  it("rejects callbacks with missing parameters", async () => {
    const res = makeRes()
    const { scope, logger } = makeScope()

    await GET({ query: makeQuery({ razorpay_signature: "" }), headers: {}, scope }, res)

    expect(res.status).toHaveBeenCalledWith(400)
    expect(res.json).toHaveBeenCalledWith({
      verified: false,
      error: "Payment callback is missing required parameters.",
    })
    expect(loggedMessage(logger.warn)).toBe("RAZORPAY_PAYMENT_STATUS_REJECTED")
  })

  it("answers with the config error envelope when the secret is not set", async () => {
    delete process.env.RAZORPAY_KEY_SECRET
    const res = makeRes()
    const { scope } = makeScope()

    await GET(
      {
        query: makeQuery(),
        headers: { "x-correlation-id": "corr_status_cfg" },
        scope,
      },
      res
    )

    expect(res.status).toHaveBeenCalledWith(500)
    expect(res.json).toHaveBeenCalledWith({
      error: {
        code: "CONFIG_MISSING",
        message: "RAZORPAY_KEY_SECRET is required.",
        details: expect.any(Object),
        correlation_id: expect.any(String),
      },
    })
  })
})
