/**
 * Library entry. Importing this module has no side effects; the process
 * entry is start.ts.
 */

export * from './types';
export * from './config/constants';
export { TREND_CONFIG, createTrendOptions } from './config/trendConfig';
export type { TrendEngineOptions } from './config/trendConfig';
export * from './core/holdings';
export * from './core/positionModel';
export * from './core/allocation';
export * from './engine/trend';
export { planDecision } from './engine/decisionPlanner';
export type { PlanInput, PlannedDecision } from './engine/decisionPlanner';
export { DecisionOrchestrator, createOrchestratorOptions } from './engine/orchestrator';
export type { OrchestratorDeps, OrchestratorOptions, TickSummary, PositionOutcome } from './engine/orchestrator';
export { TrendEngineJob } from './engine/trendEngineJob';
export type { TrendJobSummary } from './engine/trendEngineJob';
export * from './risk/scoring';
export * from './risk/sizing';
export * from './execution/orderExecutor';
export { ExecutionService, buildOrderCommand } from './execution/executionService';
export { HttpOrderExecutor, parseOrderResponse } from './execution/httpOrderExecutor';
export type { PositionRepository, TrendFeaturesUpdate } from './storage/positionRepository';
export { InMemoryPositionRepository } from './storage/memoryPositionRepository';
export { SupabasePositionRepository } from './storage/supabasePositionRepository';
export * from './services/marketData';
export * from './services/phaseProvider';
export * from './services/auditLog';
export { openPositionsForApproval } from './services/allocationService';
export { TimeframeLoop } from './runtime/timeframeLoop';
export { bootstrap } from './bootstrap';
export { createStatusServer, startStatusServer } from './dashboard/server';
export * from './utils/errors';
