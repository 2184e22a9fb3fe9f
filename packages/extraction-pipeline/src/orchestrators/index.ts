export { ChapterOrchestrator } from './chapter-orchestrator';
export type { ChapterOrchestratorOptions } from './chapter-orchestrator';
export {
  CANCELLED_REASON,
  PipelineOrchestrator,
  TIMED_OUT_REASON,
} from './pipeline-orchestrator';
export type { PipelineOrchestratorOptions } from './pipeline-orchestrator';
