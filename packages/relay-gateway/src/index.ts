export { buildApp, SERVICE_NAME, type AppDeps } from "./app.js";
export { loadEnv, type Env } from "./env.js";
export { GatewayConfigSchema, configFromEnv, configHash, type GatewayConfig } from "./config.js";
