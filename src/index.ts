/**
 * Library surface: everything the CLI and web front end are built from.
 */

export { loadConfig, parseConfig } from "./config/loader.js";
export { configSchema, type Config, type SourceType } from "./config/schema.js";
export { createServices, plannerDeps, executorDeps, chatDeps, type Services } from "./runtime.js";

export * from "./sources/index.js";
export { LocalFileSource } from "./sources/local.js";
export { DriveFileSource } from "./sources/drive.js";
export type { DriveClient } from "./sources/drive-client.js";

export * from "./llm/index.js";

export { classifyFile } from "./agent/classifier.js";
export { findDuplicates } from "./agent/duplicates.js";
export { suggestStructure, type SuggestedStructure } from "./agent/suggest.js";
export { chat, type ChatAnswer } from "./agent/chat.js";
export type { ClassificationDecision, DecisionAction } from "./agent/types.js";

export { indexSource, type IndexStats } from "./retrieval/indexer.js";
export { openIndexDb } from "./retrieval/db.js";
export { retrieve } from "./retrieval/retriever.js";

export { createPlan } from "./plan/planner.js";
export { createPlanStore, type PlanStore } from "./plan/store.js";
export type { Plan, PlannedAction, PlanStatus, ActionStatus } from "./plan/types.js";
export { applyPlan, type ApplyResult } from "./executor/executor.js";
export { createProtectedMatcher } from "./executor/protected.js";

export { AuditLogger } from "./audit/logger.js";
export { startGatewayHttp } from "./gateway/http/server.js";
export { diagnoseDoctor } from "./doctor/index.js";
