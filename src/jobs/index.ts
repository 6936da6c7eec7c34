/**
 * Pipeline Jobs Module
 * Lays out CI pipeline jobs using the grid layout engine
 */

// Types
export type {
    JobInput,
    JobOutput,
    JobConfig,
    PipelineConfig,
    JobNodePayload,
    InputNodePayload,
    OutputNodePayload,
    JobGraphPayload,
    PipelineValidationResult
} from './types.js';

// Validation
export { validatePipelineJson } from './validation.js';

// Graph construction and layout
export {
    jobNodeId,
    inputNodeId,
    outputNodeId,
    jobsToGraphInput,
    layoutJobs,
    type LayoutJobsOptions
} from './graph.js';
