import type { MedusaRequest } from "@medusajs/framework/http"
import {
  CORRELATION_ID_HEADER,
  extractCorrelationIdFromRequest,
} from "../../../modules/logging/correlation"
import { logEvent } from "../../../modules/logging/log-event"
import {
  type PaymentLinkCallbackPayload,
  SIGNATURE_MISMATCH_MESSAGE,
  toRazorpayErrorEnvelope,
  validateRazorpayConfig,
  verifyPaymentLinkSignature,
} from "../../../modules/payment-razorpay"

type PaymentStatusRequest = Pick<MedusaRequest, "query" | "headers"> & {
  scope?: unknown
}

type PaymentStatusResponse = {
  status: (code: number) => { json: (body: unknown) => unknown }
  setHeader: (name: string, value: string) => unknown
}

const CALLBACK_FIELDS = [
  "razorpay_payment_id",
  "razorpay_payment_link_id",
  "razorpay_payment_link_reference_id",
  "razorpay_payment_link_status",
  "razorpay_signature",
] as const

const PAYMENT_STATUS_OPERATION = "payment_link.callback"

export const MISSING_CALLBACK_FIELDS_MESSAGE =
  "Payment callback is missing required parameters."

function readQueryValue(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function readCallbackPayload(query: Record<string, unknown>): {
  payload: PaymentLinkCallbackPayload
  missing: string[]
} {
  const payload: PaymentLinkCallbackPayload = {
    razorpay_payment_id: readQueryValue(query.razorpay_payment_id),
    razorpay_payment_link_id: readQueryValue(query.razorpay_payment_link_id),
    razorpay_payment_link_reference_id: readQueryValue(
      query.razorpay_payment_link_reference_id
    ),
    razorpay_payment_link_status: readQueryValue(
      query.razorpay_payment_link_status
    ),
    razorpay_signature: readQueryValue(query.razorpay_signature),
  }

  return {
    payload,
    missing: CALLBACK_FIELDS.filter((field) => !payload[field]),
  }
}

/**
 * Landing endpoint for the payment link `callback_url`. Razorpay redirects the
 * customer here with the outcome in the query string.
 */
export const GET = async (
  req: PaymentStatusRequest,
  res: PaymentStatusResponse
) => {
  const correlationId = extractCorrelationIdFromRequest(req)
  res.setHeader(CORRELATION_ID_HEADER, correlationId)

  const { payload, missing } = readCallbackPayload(req.query)
  if (missing.length) {
    logEvent(
      "RAZORPAY_PAYMENT_STATUS_REJECTED",
      { reason: "missing_fields", missing },
      correlationId,
      {
        level: "warn",
        scopeOrLogger: req.scope,
        operation: PAYMENT_STATUS_OPERATION,
      }
    )
    res.status(400).json({
      verified: false,
      error: MISSING_CALLBACK_FIELDS_MESSAGE,
    })
    return
  }

  let keySecret: string
  try {
    keySecret = validateRazorpayConfig(process.env).credentials.keySecret
  } catch (error) {
    const envelope = toRazorpayErrorEnvelope(error, {
      correlation_id: correlationId,
    })
    logEvent(
      "RAZORPAY_PAYMENT_STATUS_CONFIG_ERROR",
      { error },
      correlationId,
      {
        level: "error",
        scopeOrLogger: req.scope,
        error_code: envelope.body.error.code,
      }
    )
    res.status(envelope.status).json(envelope.body)
    return
  }

  const verified = verifyPaymentLinkSignature(payload, keySecret, {
    correlation_id: correlationId,
    scopeOrLogger: req.scope,
  })

  if (!verified) {
    logEvent(
      "RAZORPAY_PAYMENT_STATUS_REJECTED",
      { reason: "signature_mismatch" },
      correlationId,
      {
        level: "warn",
        scopeOrLogger: req.scope,
        error_code: "SIGNATURE_MISMATCH",
        operation: PAYMENT_STATUS_OPERATION,
        payment_link_id: payload.razorpay_payment_link_id,
        payment_id: payload.razorpay_payment_id,
      }
    )
    res.status(400).json({
      verified: false,
      error: SIGNATURE_MISMATCH_MESSAGE,
    })
    return
  }

  logEvent(
    "RAZORPAY_PAYMENT_STATUS_VERIFIED",
    { status: payload.razorpay_payment_link_status },
    correlationId,
    {
      scopeOrLogger: req.scope,
      operation: PAYMENT_STATUS_OPERATION,
      payment_link_id: payload.razorpay_payment_link_id,
      payment_id: payload.razorpay_payment_id,
    }
  )

  res.status(200).json({
    verified: true,
    status: payload.razorpay_payment_link_status,
    payment_id: payload.razorpay_payment_id,
    payment_link_id: payload.razorpay_payment_link_id,
    reference_id: payload.razorpay_payment_link_reference_id,
  })
}
