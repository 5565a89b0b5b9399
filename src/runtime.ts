/**
 * Wires a loaded config into the long-lived services shared by the CLI and
 * the web front end.
 */

import type { ChatDeps } from "./agent/chat.js";
import { createSessionTranscriptStore, type SessionTranscriptStore } from "./agent/session-transcript.js";
import { AuditLogger } from "./audit/logger.js";
import type { Config, SourceType } from "./config/schema.js";
import { createProtectedMatcher, type ProtectedMatcher } from "./executor/protected.js";
import type { ExecutorDeps } from "./executor/executor.js";
import { createLLMClient } from "./llm/client.js";
import type { LLMClient } from "./llm/types.js";
import type { PlannerDeps } from "./plan/planner.js";
import { createPlanStore, type PlanStore } from "./plan/store.js";
import { openIndexDb, type IndexDb } from "./retrieval/db.js";
import { queryEmbedder } from "./retrieval/retriever.js";
import { createFileSource } from "./sources/index.js";
import type { FileSource } from "./sources/types.js";

export interface Services {
  config: Config;
  source: FileSource;
  llm: LLMClient;
  plans: PlanStore;
  index: IndexDb;
  audit: AuditLogger;
  transcripts: SessionTranscriptStore;
  isProtected: ProtectedMatcher;
  close(): void;
}

export async function createServices(config: Config, sourceType?: SourceType): Promise<Services> {
  const source = await createFileSource(config, sourceType);
  const plans = createPlanStore(config.organize.planStorePath);
  const index = openIndexDb(config.index.path);

  return {
    config,
    source,
    llm: createLLMClient(config.llm),
    plans,
    index,
    audit: new AuditLogger(config.audit.path),
    transcripts: createSessionTranscriptStore(config.sessions.dir),
    isProtected: createProtectedMatcher(config.organize.protect),
    close() {
      plans.close();
      index.close();
    },
  };
}

export function plannerDeps(services: Services): PlannerDeps {
  return {
    source: services.source,
    llm: services.llm,
    store: services.plans,
    organize: services.config.organize,
    isProtected: services.isProtected,
  };
}

export function executorDeps(services: Services): ExecutorDeps {
  return {
    source: services.source,
    store: services.plans,
    organize: services.config.organize,
    audit: services.audit,
    isProtected: services.isProtected,
  };
}

export function chatDeps(services: Services): ChatDeps {
  return {
    db: services.index,
    llm: services.llm,
    transcripts: services.transcripts,
    topK: services.config.index.topK,
    maxTurns: services.config.sessions.maxTurns,
    embed: queryEmbedder(services.llm, services.config.index.embeddings),
  };
}
