import crypto from "crypto"
import { resolveCorrelationId } from "../logging/correlation"
import { logEvent } from "../logging/log-event"
import { RazorpayErrorCode, RazorpayIntegrationError } from "./errors"

export const SIGNATURE_MISMATCH_MESSAGE =
  "Razorpay Payment Signature Verification Failed"

/** Query parameters Razorpay appends to the payment link `callback_url`. */
export type PaymentLinkCallbackPayload = {
  razorpay_payment_link_id: string
  razorpay_payment_link_reference_id: string
  razorpay_payment_link_status: string
  razorpay_payment_id: string
  razorpay_signature: string
}

export type VerifySignatureOptions = {
  raiseOnMismatch?: boolean
  correlation_id?: string
  scopeOrLogger?: unknown
}

// Field order is Razorpay's own canonicalization.
export function buildPaymentLinkSignatureMessage(
  payload: Omit<PaymentLinkCallbackPayload, "razorpay_signature">
): string {
  return [
    payload.razorpay_payment_link_id,
    payload.razorpay_payment_link_reference_id,
    payload.razorpay_payment_link_status,
    payload.razorpay_payment_id,
  ].join("|")
}

export function computePaymentLinkSignature(
  payload: Omit<PaymentLinkCallbackPayload, "razorpay_signature">,
  secret: string
): string {
  return crypto
    .createHmac("sha256", Buffer.from(secret, "utf8"))
    .update(Buffer.from(buildPaymentLinkSignatureMessage(payload), "utf8"))
    .digest("hex")
}

function isTimingSafeMatch(signature: string, expected: string): boolean {
  const signatureBuffer = Buffer.from(signature, "utf8")
  const expectedBuffer = Buffer.from(expected, "utf8")

  if (signatureBuffer.length !== expectedBuffer.length) {
    return false
  }

  return crypto.timingSafeEqual(signatureBuffer, expectedBuffer)
}

/**
 * Checks that a payment link callback was signed with `secret`.
 *
 * Returns `false` on a mismatch unless `raiseOnMismatch` is set, in which case
 * a `SIGNATURE_MISMATCH` error is thrown instead.
 */
export function verifyPaymentLinkSignature(
  payload: PaymentLinkCallbackPayload,
  secret: string,
  options: VerifySignatureOptions = {}
): boolean {
  const expected = computePaymentLinkSignature(payload, secret)
  if (isTimingSafeMatch(payload.razorpay_signature, expected)) {
    return true
  }

  if (!options.raiseOnMismatch) {
    return false
  }

  const correlationId = resolveCorrelationId(options.correlation_id)
  logEvent(
    "RAZORPAY_SIGNATURE_VERIFICATION_FAIL",
    {
      reason: "signature_mismatch",
      razorpay_payment_link_id: payload.razorpay_payment_link_id,
      razorpay_payment_id: payload.razorpay_payment_id,
    },
    correlationId,
    {
      level: "warn",
      scopeOrLogger: options.scopeOrLogger,
      error_code: RazorpayErrorCode.SIGNATURE_MISMATCH,
    }
  )

  throw new RazorpayIntegrationError({
    code: RazorpayErrorCode.SIGNATURE_MISMATCH,
    message: SIGNATURE_MISMATCH_MESSAGE,
    correlation_id: correlationId,
    details: {
      razorpay_payment_link_id: payload.razorpay_payment_link_id,
      razorpay_payment_id: payload.razorpay_payment_id,
    },
  })
}
