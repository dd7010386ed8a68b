export { NarrationEngine, createNarrationEngine, type NarrationEngineOptions } from "./engine";
export { DEFAULT_OUTCOMES, FallbackNarrator, composeFallbackScene } from "./fallback";
export { RemoteNarrator } from "./remote";
export type { NarrationMode, NarrationStrategy } from "./types";
