/**
 * Pipeline Jobs - Type Definitions
 * CI pipeline description (jobs, inputs, outputs) and its graph payloads
 */

// ==================== PIPELINE CONFIG ====================

/**
 * A resource fetched by a job.
 * With `passed`, only versions that went through those jobs are used,
 * which makes the job run after them.
 */
export interface JobInput {
    name: string;
    resource?: string;   // Defaults to `name`
    passed?: string[];   // Upstream job names
    trigger?: boolean;
}

/** A resource a job pushes. */
export interface JobOutput {
    name: string;
    resource?: string;   // Defaults to `name`
}

export interface JobConfig {
    name: string;
    inputs: JobInput[];
    outputs: JobOutput[];
}

export interface PipelineConfig {
    jobs: JobConfig[];
}

// ==================== GRAPH PAYLOADS ====================

export interface JobNodePayload {
    kind: 'job';
    job: string;
}

/** Unconstrained input: the resource feeds the job directly. */
export interface InputNodePayload {
    kind: 'input';
    job: string;
    input: string;
    resource: string;
    trigger: boolean;
}

export interface OutputNodePayload {
    kind: 'output';
    job: string;
    output: string;
    resource: string;
}

export type JobGraphPayload = JobNodePayload | InputNodePayload | OutputNodePayload;

// ==================== VALIDATION ====================

/** Result of pipeline config validation */
export interface PipelineValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
    config?: PipelineConfig;
}
