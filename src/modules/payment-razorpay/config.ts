import { RazorpayErrorCode, RazorpayIntegrationError } from "./errors"

export type RazorpayPaymentsMode = "test" | "live"

export const DEFAULT_RAZORPAY_API_BASE_URL = "https://api.razorpay.com/v1/"
export const DEFAULT_BACKEND_URL = "http://localhost:9000"
export const PAYMENT_STATUS_ROUTE = "/razorpay/payment-status"

export type RazorpayCredentials = Readonly<{
  keyId: string
  keySecret: string
}>

export type RazorpayConfig = {
  mode: RazorpayPaymentsMode
  credentials: RazorpayCredentials
  apiBaseUrl: string
  paymentStatusUrl: string
}

const CONFIG_CORRELATION_ID = "razorpay-config"

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function readMode(value: unknown): RazorpayPaymentsMode {
  const normalized = readText(value).toLowerCase()
  if (normalized === "test") {
    return "test"
  }

  if (normalized === "live") {
    return "live"
  }

  throw new RazorpayIntegrationError({
    code: RazorpayErrorCode.CONFIG_MODE_MISMATCH,
    message: "PAYMENTS_MODE must be 'test' or 'live'.",
    correlation_id: CONFIG_CORRELATION_ID,
    details: {
      mode: normalized || null,
    },
  })
}

function assertRequired(name: string, value: string): void {
  if (value) {
    return
  }

  throw new RazorpayIntegrationError({
    code: RazorpayErrorCode.CONFIG_MISSING,
    message: `${name} is required.`,
    correlation_id: CONFIG_CORRELATION_ID,
    details: {
      field: name,
    },
  })
}

function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`
}

function withoutTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "")
}

export function createRazorpayCredentials(
  keyId: string,
  keySecret: string
): RazorpayCredentials {
  return Object.freeze({
    keyId: readText(keyId),
    keySecret: readText(keySecret),
  })
}

export function buildPaymentStatusUrl(backendUrl: string): string {
  return `${withoutTrailingSlash(readText(backendUrl) || DEFAULT_BACKEND_URL)}${PAYMENT_STATUS_ROUTE}`
}

export function validateRazorpayConfig(
  env: Record<string, unknown> = process.env
): RazorpayConfig {
  const mode = readMode(env.PAYMENTS_MODE ?? "test")
  const keyId = readText(env.RAZORPAY_KEY_ID)
  const keySecret = readText(env.RAZORPAY_KEY_SECRET)

  assertRequired("RAZORPAY_KEY_ID", keyId)
  assertRequired("RAZORPAY_KEY_SECRET", keySecret)

  if (mode === "test" && keyId.startsWith("rzp_live_")) {
    throw new RazorpayIntegrationError({
      code: RazorpayErrorCode.CONFIG_MODE_MISMATCH,
      message: "PAYMENTS_MODE=test cannot use rzp_live_ key.",
      correlation_id: CONFIG_CORRELATION_ID,
      details: {
        mode,
        key_prefix: "rzp_live_",
      },
    })
  }

  if (mode === "live" && keyId.startsWith("rzp_test_")) {
    throw new RazorpayIntegrationError({
      code: RazorpayErrorCode.CONFIG_MODE_MISMATCH,
      message: "PAYMENTS_MODE=live cannot use rzp_test_ key.",
      correlation_id: CONFIG_CORRELATION_ID,
      details: {
        mode,
        key_prefix: "rzp_test_",
      },
    })
  }

  return {
    mode,
    credentials: createRazorpayCredentials(keyId, keySecret),
    apiBaseUrl: withTrailingSlash(
      readText(env.RAZORPAY_API_BASE_URL) || DEFAULT_RAZORPAY_API_BASE_URL
    ),
    paymentStatusUrl: buildPaymentStatusUrl(readText(env.MEDUSA_BACKEND_URL)),
  }
}
