import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import { resolveCorrelationId } from "../modules/logging/correlation"
import { logEvent } from "../modules/logging/log-event"
import type { ScopeLike } from "../modules/logging/structured-logger"
import {
  type PgConnectionLike,
  RazorpayPaymentLogRepository,
} from "../modules/payment-log"

function isPgConnectionLike(value: unknown): value is PgConnectionLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "raw" in value &&
    typeof value.raw === "function"
  )
}

export default async function paymentLogRefundJob(container: ScopeLike) {
  const correlationId = resolveCorrelationId()
  const pgConnection = container.resolve(ContainerRegistrationKeys.PG_CONNECTION)
  if (!isPgConnectionLike(pgConnection)) {
    throw new Error("PG connection is not registered in the container.")
  }

  const repository = new RazorpayPaymentLogRepository(pgConnection)
  const result = await repository.markFailedAsRefund()

  logEvent(
    "RAZORPAY_PAYMENT_LOG_REFUND_MARKED",
    {
      updated: result.updated,
      message: result.message,
    },
    correlationId,
    { scopeOrLogger: container }
  )
}

export const config = {
  name: "razorpay-payment-log-refund",
  schedule: process.env.RAZORPAY_PAYMENT_LOG_REFUND_CRON || "0 * * * *",
}
