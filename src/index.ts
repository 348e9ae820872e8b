export * from "./editor/index.js"
export * from "./text/index.js"
export * from "./clipboard/index.js"
export { loadAppConfig, type AppConfig } from "./config/appConfig.js"
