export { convertStf, decodeInput, runConversion } from "./convert.js";
export type { ConversionOutput, ConvertOptions } from "./convert.js";
export { CollectingDiagnostics, createConsoleDiagnostics } from "./diagnostics.js";
export type { ConsoleDiagnosticsOptions } from "./diagnostics.js";
export { loadConfig, mergeConfig, getConfigPath, expandPath } from "./config/index.js";
export { ConverterConfigSchema, DEFAULT_CONFIG } from "./config/schema.js";
export type { ConverterConfig, InputEncoding } from "./config/schema.js";
export * from "./stf/index.js";
