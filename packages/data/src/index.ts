export * from "./types";
export { CsvBarSource, parseCsvBars } from "./csvBarSource";
export type { CsvBarSourceOptions, CsvParseResult } from "./csvBarSource";
export { InMemoryBarSource } from "./memoryBarSource";
export { normalizeBars } from "./normalize";
export { normalizeSymbol } from "./symbols";
