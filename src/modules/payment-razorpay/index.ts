export * from "./client"
export * from "./config"
export * from "./errors"
export * from "./normalizer"
export * from "./signature"
export * from "./transport"
