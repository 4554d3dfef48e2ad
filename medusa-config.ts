import { loadEnv, defineConfig } from "@medusajs/framework/utils"
import { validateRazorpayConfig } from "./src/modules/payment-razorpay/config"

loadEnv(process.env.NODE_ENV || "development", process.cwd())

// Fail the boot on bad Razorpay credentials instead of on the first payment.
if (process.env.ENABLE_RAZORPAY === "true") {
  validateRazorpayConfig(process.env)
}

export default defineConfig({
  projectConfig: {
    databaseUrl: process.env.DATABASE_URL,
    http: {
      storeCors: process.env.STORE_CORS || "",
      adminCors: process.env.ADMIN_CORS || "",
      authCors: process.env.AUTH_CORS || "",
      jwtSecret: process.env.JWT_SECRET || "supersecret",
      cookieSecret: process.env.COOKIE_SECRET || "supersecret",
    },
  },
})
