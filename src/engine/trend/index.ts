export { evaluateTrend, initialMeta, noFlags } from './trendEngine';
export { selectAction, FLAG_PRECEDENCE } from './precedence';
export { checkEntryQuality, computeTrendStrength, computeSrBoost } from './entryQuality';
export { computeExtensionScores, dipBuyThreshold, hallwayPosition } from './extensionScores';
export * from './emaStructure';
