// Orchestrator Module - Main exports

export { ChatOrchestrator, DEFAULT_MAX_TOOL_ROUNDS } from './orchestrator.js';
export type { LoopState, OrchestratorOptions, OrchestratorResult, StopReason } from './types.js';
