/**
 * @monthbook/store
 *
 * Stage checkpoints and the resume-point resolver.
 */

export {
  CheckpointStore,
  CHECKPOINT_STAGES,
  type CheckpointStage,
  type CheckpointStoreOptions,
} from './checkpoint-store.js';

export {
  resolveResumePoint,
  describeResumePoint,
  type ResumePoint,
  type ResumeStage,
} from './resume.js';
