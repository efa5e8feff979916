export * from "./plan/index.js"
export * from "./pool/index.js"
