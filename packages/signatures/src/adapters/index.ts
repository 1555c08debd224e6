export type { Adapter, ParseDiagnostics, ParseResult } from "./adapter.js";
export { formatValue } from "./adapter.js";
export { MarkerAdapter, marker } from "./marker.js";
export { JSONAdapter, normalizeKey } from "./json.js";
export type { JSONAdapterOptions } from "./json.js";
export { FallbackAdapter } from "./fallback.js";
export type { FallbackAdapterOptions } from "./fallback.js";
