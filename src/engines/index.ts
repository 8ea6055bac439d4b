import type { RunEnvironment } from '../config.js';
import { ProcessWorkflowEngine } from './process-engine.js';
import type { WorkflowEngine } from './types.js';

export function createWorkflowEngine(environment: RunEnvironment): WorkflowEngine {
  return new ProcessWorkflowEngine(environment.engineCommand);
}

export { buildEngineArguments, ProcessWorkflowEngine } from './process-engine.js';
export type {
  EngineCapabilities,
  EngineResult,
  WorkflowEngine,
  WorkflowExecutionRequest,
} from './types.js';
