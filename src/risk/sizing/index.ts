export type { AllocationRiskContext, SizeResult } from './types';
export { entryRiskMultiplier, trimRiskMultiplier } from './multipliers';
export { computeEntrySize, computeTrimSize, entryStageFor, tierFor } from './computeSize';
