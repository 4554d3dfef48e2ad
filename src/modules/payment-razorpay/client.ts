import { randomUUID } from "crypto"
import {
  resolveCorrelationId,
  runWithCorrelationContext,
  setCorrelationContext,
} from "../logging/correlation"
import { logEvent } from "../logging/log-event"
import {
  DEFAULT_BACKEND_URL,
  DEFAULT_RAZORPAY_API_BASE_URL,
  buildPaymentStatusUrl,
  createRazorpayCredentials,
  type RazorpayConfig,
  type RazorpayCredentials,
} from "./config"
import {
  RazorpayErrorCode,
  RazorpayIntegrationError,
  validationError,
} from "./errors"
import { handleApiResponse, type RazorpayResponse } from "./normalizer"
import {
  type PaymentLinkCallbackPayload,
  verifyPaymentLinkSignature,
} from "./signature"
import {
  type FetchLike,
  HttpRazorpayTransport,
  type RazorpaySdkLike,
  SdkRazorpayTransport,
  createRazorpaySdk,
} from "./transport"

export const PAYMENT_LINK_CURRENCY = "INR"
export const PAYMENT_LINKS_ENDPOINT = "payment_links"
export const CREDENTIAL_PROBE_ENDPOINT = "customers?count=1"

export const AMOUNT_REQUIRED_MESSAGE =
  "Amount (INT) is required for creating a payment link !"
export const PAYMENT_ID_REQUIRED_FOR_FETCH_MESSAGE =
  "Please Provide Payment ID for fetching the respective payment !"
export const PAYMENT_ID_REQUIRED_FOR_REFUND_MESSAGE =
  "Please Provide Payment ID for which the amount needs to be refunded !"
export const REFUND_AMOUNT_INVALID_MESSAGE =
  "Refund amount must be a positive whole number of rupees."
export const AMOUNT_TOO_LARGE_MESSAGE = "Amount is too large to convert to paise."

export const EMPTY_NOTES: Readonly<Record<string, string>> = Object.freeze({})

export type PaymentLinkRequest = {
  /** Whole rupees; converted to paise before sending. */
  amount?: number
  callback_url?: string
  description?: string
  /** Unix timestamp in seconds, 0 for no expiry. */
  expire_by?: number
  payer_name?: string
  payer_email?: string
  payer_phone?: string
  reference_id?: string
  notify_via_email?: boolean
  notify_via_sms?: boolean
  notes?: Readonly<Record<string, string>>
}

export type GetOrCreatePaymentLinkInput = PaymentLinkRequest & {
  payment_link_id?: string
}

export type RazorpayClientOptions = {
  apiBaseUrl?: string
  paymentStatusUrl?: string
}

export type RazorpayClientRuntime = {
  fetch?: FetchLike
  sdk?: RazorpaySdkLike
  generateReferenceId?: () => string
  scopeOrLogger?: unknown
}

export type RazorpayOperationOptions = {
  correlation_id?: string
}

type ResolvedClientSettings = {
  paymentStatusUrl: string
  generateReferenceId: () => string
  scopeOrLogger?: unknown
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1
}

// Razorpay takes amounts in paise as integers.
function toMinorUnits(amount: number): number | undefined {
  const paise = amount * 100
  return Number.isSafeInteger(paise) ? paise : undefined
}

/**
 * Probes `customers?count=1` with the given credentials. Any failure, whatever
 * its origin, is reported as `AUTHENTICATION_ERROR`.
 */
export async function validateRazorpayCredentials(
  credentials: RazorpayCredentials,
  http: HttpRazorpayTransport,
  input: {
    correlation_id?: string
    scopeOrLogger?: unknown
  } = {}
): Promise<void> {
  const correlationId = resolveCorrelationId(input.correlation_id)

  if (!credentials.keyId || !credentials.keySecret) {
    throw new RazorpayIntegrationError({
      code: RazorpayErrorCode.AUTHENTICATION_ERROR,
      message: "Razorpay API key and secret are required.",
      correlation_id: correlationId,
    })
  }

  try {
    await handleApiResponse(
      () => http.send({ method: "GET", path: CREDENTIAL_PROBE_ENDPOINT }),
      {
        correlation_id: correlationId,
        endpoint: CREDENTIAL_PROBE_ENDPOINT,
        scopeOrLogger: input.scopeOrLogger,
      }
    )
  } catch (error) {
    logEvent(
      "RAZORPAY_CREDENTIALS_INVALID",
      {
        endpoint: CREDENTIAL_PROBE_ENDPOINT,
        reason: error instanceof RazorpayIntegrationError ? error.code : "unknown",
      },
      correlationId,
      {
        level: "error",
        scopeOrLogger: input.scopeOrLogger,
        error_code: RazorpayErrorCode.AUTHENTICATION_ERROR,
      }
    )

    throw new RazorpayIntegrationError({
      code: RazorpayErrorCode.AUTHENTICATION_ERROR,
      message: "Razorpay credentials could not be verified.",
      correlation_id: correlationId,
      details: {
        endpoint: CREDENTIAL_PROBE_ENDPOINT,
      },
      cause: error,
    })
  }
}

/**
 * Razorpay payment links, payments and refunds. Obtain one through
 * {@link RazorpayPaymentClient.create}, which refuses to hand out a client for
 * credentials Razorpay does not accept.
 */
export class RazorpayPaymentClient {
  private constructor(
    private readonly credentials: RazorpayCredentials,
    private readonly http: HttpRazorpayTransport,
    private readonly sdk: SdkRazorpayTransport,
    private readonly settings: ResolvedClientSettings
  ) {}

  static async create(
    credentials: RazorpayCredentials,
    options: RazorpayClientOptions = {},
    runtime: RazorpayClientRuntime = {}
  ): Promise<RazorpayPaymentClient> {
    const frozen = createRazorpayCredentials(
      credentials.keyId,
      credentials.keySecret
    )
    const http = new HttpRazorpayTransport(frozen, {
      baseUrl: readText(options.apiBaseUrl) || DEFAULT_RAZORPAY_API_BASE_URL,
      fetch: runtime.fetch,
    })

    await validateRazorpayCredentials(frozen, http, {
      scopeOrLogger: runtime.scopeOrLogger,
    })

    // the SDK client is only built for credentials that passed the probe
    const sdk = new SdkRazorpayTransport(runtime.sdk ?? createRazorpaySdk(frozen))

    return new RazorpayPaymentClient(frozen, http, sdk, {
      paymentStatusUrl:
        readText(options.paymentStatusUrl) ||
        buildPaymentStatusUrl(DEFAULT_BACKEND_URL),
      generateReferenceId: runtime.generateReferenceId ?? randomUUID,
      scopeOrLogger: runtime.scopeOrLogger,
    })
  }

  static async fromConfig(
    config: RazorpayConfig,
    runtime: RazorpayClientRuntime = {}
  ): Promise<RazorpayPaymentClient> {
    return RazorpayPaymentClient.create(
      config.credentials,
      {
        apiBaseUrl: config.apiBaseUrl,
        paymentStatusUrl: config.paymentStatusUrl,
      },
      runtime
    )
  }

  /**
   * Fetches the link when `payment_link_id` is given (everything else is
   * ignored), otherwise creates a new one.
   */
  async getOrCreatePaymentLink(
    input: GetOrCreatePaymentLinkInput = {},
    options: RazorpayOperationOptions = {}
  ): Promise<RazorpayResponse> {
    const correlationId = resolveCorrelationId(options.correlation_id)

    return runWithCorrelationContext(correlationId, async () => {
      const paymentLinkId = readText(input.payment_link_id)
      if (!paymentLinkId) {
        setCorrelationContext({ operation: "payment_link.create" })
        return this.createPaymentLink(input, correlationId)
      }

      setCorrelationContext({
        operation: "payment_link.fetch",
        payment_link_id: paymentLinkId,
      })
      const endpoint = `${PAYMENT_LINKS_ENDPOINT}/${encodeURIComponent(paymentLinkId)}`
      return handleApiResponse(
        () => this.http.send({ method: "GET", path: endpoint }),
        {
          correlation_id: correlationId,
          endpoint,
          scopeOrLogger: this.settings.scopeOrLogger,
        }
      )
    })
  }

  private async createPaymentLink(
    request: PaymentLinkRequest,
    correlationId: string
  ): Promise<RazorpayResponse> {
    if (!isPositiveInteger(request.amount)) {
      throw validationError(AMOUNT_REQUIRED_MESSAGE, correlationId, {
        field: "amount",
      })
    }

    const amount = toMinorUnits(request.amount)
    if (amount === undefined) {
      throw validationError(AMOUNT_TOO_LARGE_MESSAGE, correlationId, {
        field: "amount",
      })
    }

    const referenceId =
      readText(request.reference_id) || this.settings.generateReferenceId()
    const body: Record<string, unknown> = {
      amount,
      callback_url:
        readText(request.callback_url) || this.settings.paymentStatusUrl,
      callback_method: "get",
      currency: PAYMENT_LINK_CURRENCY,
      customer: {
        name: request.payer_name ?? "",
        email: request.payer_email ?? "",
        phone: request.payer_phone ?? "",
      },
      description: request.description ?? "",
      expire_by: request.expire_by ?? 0,
      notify: {
        sms: request.notify_via_sms ?? false,
        email: request.notify_via_email ?? false,
      },
      reference_id: referenceId,
      notes: request.notes ?? EMPTY_NOTES,
    }

    const link = await handleApiResponse(
      () =>
        this.http.send({
          method: "POST",
          path: PAYMENT_LINKS_ENDPOINT,
          body,
        }),
      {
        correlation_id: correlationId,
        endpoint: PAYMENT_LINKS_ENDPOINT,
        scopeOrLogger: this.settings.scopeOrLogger,
      }
    )

    const paymentLinkId = readText(link.id) || undefined
    setCorrelationContext({ payment_link_id: paymentLinkId })
    logEvent(
      "RAZORPAY_PAYMENT_LINK_CREATED",
      {
        reference_id: referenceId,
        amount,
      },
      correlationId,
      {
        scopeOrLogger: this.settings.scopeOrLogger,
        operation: "payment_link.create",
        payment_link_id: paymentLinkId,
      }
    )

    return link
  }

  async getPayment(
    paymentId: string,
    options: RazorpayOperationOptions = {}
  ): Promise<RazorpayResponse> {
    const correlationId = resolveCorrelationId(options.correlation_id)

    return runWithCorrelationContext(correlationId, async () => {
      const normalizedPaymentId = readText(paymentId)
      if (!normalizedPaymentId) {
        throw validationError(PAYMENT_ID_REQUIRED_FOR_FETCH_MESSAGE, correlationId, {
          field: "payment_id",
        })
      }

      setCorrelationContext({
        operation: "payments.fetch",
        payment_id: normalizedPaymentId,
      })
      return handleApiResponse(
        () =>
          this.sdk.send({
            operation: "payments.fetch",
            payment_id: normalizedPaymentId,
          }),
        {
          correlation_id: correlationId,
          endpoint: "payments.fetch",
          scopeOrLogger: this.settings.scopeOrLogger,
        }
      )
    })
  }

  /**
   * Refunds in full when `refundAmount` is 0, otherwise refunds that many
   * rupees. Whether the amount fits the payment is Razorpay's call.
   */
  async refundPayment(
    paymentId: string,
    refundAmount = 0,
    options: RazorpayOperationOptions = {}
  ): Promise<RazorpayResponse> {
    const correlationId = resolveCorrelationId(options.correlation_id)

    return runWithCorrelationContext(correlationId, async () => {
      const normalizedPaymentId = readText(paymentId)
      if (!normalizedPaymentId) {
        throw validationError(PAYMENT_ID_REQUIRED_FOR_REFUND_MESSAGE, correlationId, {
          field: "payment_id",
        })
      }

      if (refundAmount !== 0 && !isPositiveInteger(refundAmount)) {
        throw validationError(REFUND_AMOUNT_INVALID_MESSAGE, correlationId, {
          field: "refund_amount",
        })
      }

      const amount = refundAmount === 0 ? undefined : toMinorUnits(refundAmount)
      if (refundAmount !== 0 && amount === undefined) {
        throw validationError(AMOUNT_TOO_LARGE_MESSAGE, correlationId, {
          field: "refund_amount",
        })
      }

      setCorrelationContext({
        operation: "payments.refund",
        payment_id: normalizedPaymentId,
      })
      const refund = await handleApiResponse(
        () =>
          this.sdk.send(
            amount === undefined
              ? {
                  operation: "payments.refund",
                  payment_id: normalizedPaymentId,
                }
              : {
                  operation: "payments.refund",
                  payment_id: normalizedPaymentId,
                  amount,
                }
          ),
        {
          correlation_id: correlationId,
          endpoint: "payments.refund",
          scopeOrLogger: this.settings.scopeOrLogger,
        }
      )

      logEvent(
        "RAZORPAY_REFUND_REQUESTED",
        {
          refund_id: readText(refund.id) || null,
          full_refund: amount === undefined,
        },
        correlationId,
        {
          scopeOrLogger: this.settings.scopeOrLogger,
          operation: "payments.refund",
          payment_id: normalizedPaymentId,
        }
      )

      return refund
    })
  }

  verifyPaymentSignature(
    payload: PaymentLinkCallbackPayload,
    options: {
      raiseOnMismatch?: boolean
      correlation_id?: string
    } = {}
  ): boolean {
    return verifyPaymentLinkSignature(payload, this.credentials.keySecret, {
      raiseOnMismatch: options.raiseOnMismatch,
      correlation_id: options.correlation_id,
      scopeOrLogger: this.settings.scopeOrLogger,
    })
  }
}
