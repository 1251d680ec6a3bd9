export { defineConfig, loadConfig, parseConfig, TxreportConfigSchema } from "./config.js";
export type { TxreportConfig, TxreportConfigInput } from "./config.js";
