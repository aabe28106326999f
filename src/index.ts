export * from './par';
export * from './sidecar';
export { processPair, processPairs } from './pipeline';
export type { PairOptions, PairOutcome, BatchSummary } from './pipeline';
export { DEFAULT_INFERENCE_SETTINGS, resolveInferenceSettings } from './config/inference';
export type { InferenceSettings } from './config/inference';
export * from './types';
export * from './types/bids';
