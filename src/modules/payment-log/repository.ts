import { resolveCorrelationId } from "../logging/correlation"
import { validationError } from "../payment-razorpay/errors"

export const RAZORPAY_PAYMENT_LOGS_TABLE = "razorpay_payment_logs"

export const PaymentLogStatus = {
  PENDING: "Pending",
  PAID: "Paid",
  FAILED: "Failed",
  REFUND: "Refund",
} as const

export type PaymentLogStatus =
  (typeof PaymentLogStatus)[keyof typeof PaymentLogStatus]

export const REFUND_QUEUED_MESSAGE =
  "Changed Status to Refund. These jobs will be picked up by the hourly scheduler in its next iteration !!"

type QueryResultLike = {
  rows?: Array<Record<string, unknown>>
  rowCount?: number | null
}

export type PgConnectionLike = {
  raw: (query: string, bindings?: unknown[]) => Promise<QueryResultLike>
}

export const PAYMENT_LOG_NAME_REQUIRED_MESSAGE = "Payment log name is required."

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function countUpdated(result: QueryResultLike): number {
  if (typeof result.rowCount === "number") {
    return result.rowCount
  }

  return Array.isArray(result.rows) ? result.rows.length : 0
}

/**
 * Status writes on persisted Razorpay payment log entries. The hourly refund
 * processor picks up everything left in `Refund`.
 */
export class RazorpayPaymentLogRepository {
  constructor(private readonly pgConnection: PgConnectionLike) {}

  async ensureSchema(): Promise<void> {
    await this.pgConnection.raw(`
      CREATE TABLE IF NOT EXISTS ${RAZORPAY_PAYMENT_LOGS_TABLE} (
        name TEXT PRIMARY KEY,
        status TEXT NOT NULL DEFAULT '${PaymentLogStatus.PENDING}',
        payment_link_id TEXT,
        reference_id TEXT,
        payment_id TEXT,
        amount INTEGER,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `)
  }

  async markAsRefund(
    name: string,
    options: { correlation_id?: string } = {}
  ): Promise<{ updated: number }> {
    const normalizedName = readText(name)
    if (!normalizedName) {
      throw validationError(
        PAYMENT_LOG_NAME_REQUIRED_MESSAGE,
        resolveCorrelationId(options.correlation_id),
        { field: "name" }
      )
    }

    const result = await this.pgConnection.raw(
      `
        UPDATE ${RAZORPAY_PAYMENT_LOGS_TABLE}
        SET status = ?, updated_at = NOW()
        WHERE name = ?
        RETURNING name
      `,
      [PaymentLogStatus.REFUND, normalizedName]
    )

    return { updated: countUpdated(result) }
  }

  async markFailedAsRefund(): Promise<{ updated: number; message: string }> {
    const result = await this.pgConnection.raw(
      `
        UPDATE ${RAZORPAY_PAYMENT_LOGS_TABLE}
        SET status = ?, updated_at = NOW()
        WHERE status = ?
        RETURNING name
      `,
      [PaymentLogStatus.REFUND, PaymentLogStatus.FAILED]
    )

    return {
      updated: countUpdated(result),
      message: REFUND_QUEUED_MESSAGE,
    }
  }
}
