export {
  chapterCheckpointKey,
  completedEntries,
  countCompleted,
  isRecordComplete,
} from './checkpoint-store';
export type { CheckpointStore } from './checkpoint-store';
export { FileCheckpointStore } from './file-checkpoint-store';
export { InMemoryCheckpointStore } from './in-memory-checkpoint-store';
