export * from "./repository"
