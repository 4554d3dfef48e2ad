import Razorpay from "razorpay"
import type { RazorpayCredentials } from "./config"

export type FetchResponseLike = {
  status: number
  json: () => Promise<unknown>
}

export type FetchLike = (
  url: string,
  init?: {
    method?: string
    headers?: Record<string, string>
    body?: string
  }
) => Promise<FetchResponseLike>

export type RazorpayHttpRequest = {
  method: "GET" | "POST"
  path: string
  body?: Record<string, unknown>
}

export type RazorpaySdkOperation =
  | {
      operation: "payments.fetch"
      payment_id: string
    }
  | {
      operation: "payments.refund"
      payment_id: string
      amount?: number
    }

export type RazorpayRefundParams = {
  amount?: number
}

/** The slice of the `razorpay` package this integration calls. */
export type RazorpaySdkLike = {
  payments: {
    fetch: (paymentId: string) => Promise<unknown>
    refund: (paymentId: string, params: RazorpayRefundParams) => Promise<unknown>
  }
}

/**
 * Sends one request to Razorpay. Resolves with whatever the underlying channel
 * produced (an HTTP response or an SDK payload) and rejects only when the
 * channel itself failed; interpretation is left to `handleApiResponse`.
 */
export interface RazorpayTransport<TRequest> {
  readonly kind: "http" | "sdk"
  send(request: TRequest): Promise<unknown>
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function toBasicAuthorization(credentials: RazorpayCredentials): string {
  const token = Buffer.from(
    `${credentials.keyId}:${credentials.keySecret}`,
    "utf8"
  ).toString("base64")
  return `Basic ${token}`
}

export class HttpRazorpayTransport implements RazorpayTransport<RazorpayHttpRequest> {
  readonly kind = "http"

  private readonly authorization: string
  private readonly baseUrl: string
  private readonly fetchImpl: FetchLike

  constructor(
    credentials: RazorpayCredentials,
    options: {
      baseUrl: string
      fetch?: FetchLike
    }
  ) {
    this.authorization = toBasicAuthorization(credentials)
    this.baseUrl = options.baseUrl.endsWith("/")
      ? options.baseUrl
      : `${options.baseUrl}/`
    this.fetchImpl = options.fetch ?? fetch
  }

  buildUrl(path: string): string {
    return `${this.baseUrl}${path.replace(/^\/+/, "")}`
  }

  async send(request: RazorpayHttpRequest): Promise<FetchResponseLike> {
    return this.fetchImpl(this.buildUrl(request.path), {
      method: request.method,
      headers: {
        "content-type": "application/json",
        authorization: this.authorization,
      },
      body: request.body ? JSON.stringify(request.body) : undefined,
    })
  }
}

/**
 * The SDK rejects with `{ statusCode, error: { code, description } }` when
 * Razorpay answered with an error body. That is a gateway answer, not a broken
 * channel, so it is handed back as a payload.
 */
function toGatewayErrorPayload(error: unknown): Record<string, unknown> | undefined {
  if (!isObject(error) || error instanceof Error) {
    return undefined
  }

  if (!isObject(error.error) || typeof error.error.code !== "string") {
    return undefined
  }

  return {
    statusCode: error.statusCode,
    error: error.error,
  }
}

export class SdkRazorpayTransport implements RazorpayTransport<RazorpaySdkOperation> {
  readonly kind = "sdk"

  constructor(private readonly sdk: RazorpaySdkLike) {}

  async send(request: RazorpaySdkOperation): Promise<unknown> {
    try {
      return await this.dispatch(request)
    } catch (error) {
      const gatewayPayload = toGatewayErrorPayload(error)
      if (gatewayPayload) {
        return gatewayPayload
      }

      throw error
    }
  }

  private dispatch(request: RazorpaySdkOperation): Promise<unknown> {
    switch (request.operation) {
      case "payments.fetch":
        return this.sdk.payments.fetch(request.payment_id)
      case "payments.refund":
        return this.sdk.payments.refund(
          request.payment_id,
          request.amount === undefined ? {} : { amount: request.amount }
        )
    }
  }
}

export function createRazorpaySdk(credentials: RazorpayCredentials): RazorpaySdkLike {
  const instance = new Razorpay({
    key_id: credentials.keyId,
    key_secret: credentials.keySecret,
  })

  return {
    payments: {
      fetch: (paymentId) => instance.payments.fetch(paymentId),
      refund: (paymentId, params) => instance.payments.refund(paymentId, params),
    },
  }
}
