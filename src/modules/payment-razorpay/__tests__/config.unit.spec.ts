import { validateRazorpayConfig } from "../config"
import { RazorpayIntegrationError } from "../errors"

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }

  return undefined
}

describe("validateRazorpayConfig", () => {
  it("throws CONFIG_MISSING when RAZORPAY_KEY_ID is missing", () => {
    const error = captureError(() =>
      validateRazorpayConfig({
        PAYMENTS_MODE: "test",
        RAZORPAY_KEY_SECRET: "test-secret",
      })
    )

    expect(error).toBeInstanceOf(RazorpayIntegrationError)
    expect(error).toMatchObject({
      code: "CONFIG_MISSING",
      details: { field: "RAZORPAY_KEY_ID" },
    })
  })

  it("throws CONFIG_MISSING when RAZORPAY_KEY_SECRET is blank", () => {
    expect(() =>
      validateRazorpayConfig({
        RAZORPAY_KEY_ID: "rzp_test_123",
        RAZORPAY_KEY_SECRET: "   ",
      })
    ).toThrow("RAZORPAY_KEY_SECRET is required.")
  })

  it("throws CONFIG_MODE_MISMATCH when PAYMENTS_MODE=test uses live key", () => {
    const error = captureError(() =>
      validateRazorpayConfig({
        PAYMENTS_MODE: "test",
        RAZORPAY_KEY_ID: "rzp_live_123",
        RAZORPAY_KEY_SECRET: "test-secret",
      })
    )

    expect(error).toMatchObject({ code: "CONFIG_MODE_MISMATCH" })
  })

  it("throws CONFIG_MODE_MISMATCH when PAYMENTS_MODE=live uses test key", () => {
    const error = captureError(() =>
      validateRazorpayConfig({
        PAYMENTS_MODE: "live",
        RAZORPAY_KEY_ID: "rzp_test_123",
        RAZORPAY_KEY_SECRET: "test-secret",
      })
    )

    expect(error).toMatchObject({ code: "CONFIG_MODE_MISMATCH" })
  })

  it("rejects an unknown PAYMENTS_MODE", () => {
    expect(() =>
      validateRazorpayConfig({
        PAYMENTS_MODE: "sandbox",
        RAZORPAY_KEY_ID: "rzp_test_123",
        RAZORPAY_KEY_SECRET: "test-secret",
      })
    ).toThrow("PAYMENTS_MODE must be 'test' or 'live'.")
  })

  it("defaults to test mode, the public API base url and the local payment status url", () => {
    const config = validateRazorpayConfig({
      RAZORPAY_KEY_ID: " rzp_test_123 ",
      RAZORPAY_KEY_SECRET: "test-secret",
    })

    expect(config).toEqual({
      mode: "test",
      credentials: {
        keyId: "rzp_test_123",
        keySecret: "test-secret",
      },
      apiBaseUrl: "https://api.razorpay.com/v1/",
      paymentStatusUrl: "http://localhost:9000/razorpay/payment-status",
    })
    expect(Object.isFrozen(config.credentials)).toBe(true)
  })

  it("normalizes configured urls", () => {
    const config = validateRazorpayConfig({
      PAYMENTS_MODE: "LIVE",
      RAZORPAY_KEY_ID: "rzp_live_123",
      RAZORPAY_KEY_SECRET: "test-secret",
      RAZORPAY_API_BASE_URL: "http://127.0.0.1:4010/v1",
      MEDUSA_BACKEND_URL: "https://shop.example.com/",
    })

    expect(config.mode).toBe("live")
    expect(config.apiBaseUrl).toBe("http://127.0.0.1:4010/v1/")
    expect(config.paymentStatusUrl).toBe(
      "https://shop.example.com/razorpay/payment-status"
    )
  })
})
