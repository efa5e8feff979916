export { PlanValidationError } from "./errors.js"
export { formatPlanSummary, Plan, type PlanInit } from "./model.js"
export {
  type CheckpointStepDocument,
  CheckpointTypeSchema,
  type CheckStepDocument,
  type PlanDocument,
  type PlanDocumentInput,
  PlanDocumentSchema,
  RiskLevelSchema,
  type StepDocument,
  StepDocumentSchema,
  StepStatusSchema,
  type WorkStepDocument,
} from "./schemas.js"
export type {
  CheckpointStepSpec,
  CheckpointType,
  CheckStepKind,
  CheckStepSpec,
  RiskLevel,
  Step,
  StepKind,
  StepProgress,
  StepResultSnapshot,
  StepSpec,
  StepState,
  StepStatus,
  WorkStepKind,
  WorkStepSpec,
} from "./types.js"
export { STEP_KINDS } from "./types.js"
export {
  assignWaves,
  assignWavesKahn,
  estimateExecution,
  type ExecutionEstimate,
  groupByWave,
  maxWave,
  validateWaveAssignment,
  type WaveAssignment,
} from "./waves.js"
