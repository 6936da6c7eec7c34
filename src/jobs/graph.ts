/**
 * Pipeline Jobs - Graph Construction
 *
 * Node ids:
 *   job:<job>
 *   input:<job>:<input>     (inputs without `passed`)
 *   output:<job>:<output>
 *
 * Edges:
 *   input -> job, upstream job -> job (per `passed`), job -> output
 */

import { EdgeInput, GraphInput, HeightFn, LayoutConfig, NodeInput, NodeId, toNodeId } from '../types.js';
import { GraphInputError, LayoutResult, runLayoutPipeline } from '../layout/index.js';
import { PipelineConfig, JobGraphPayload } from './types.js';

export function jobNodeId(job: string): NodeId {
    return toNodeId(`job:${job}`);
}

export function inputNodeId(job: string, input: string): NodeId {
    return toNodeId(`input:${job}:${input}`);
}

export function outputNodeId(job: string, output: string): NodeId {
    return toNodeId(`output:${job}:${output}`);
}

/**
 * Convert a pipeline config into graph input for the layout pipeline.
 */
export function jobsToGraphInput(config: PipelineConfig): GraphInput<JobGraphPayload> {
    const jobNames = new Set<string>();
    for (const job of config.jobs) {
        if (jobNames.has(job.name)) {
            throw new GraphInputError(`Duplicate job name: ${job.name}`, [jobNodeId(job.name)]);
        }
        jobNames.add(job.name);
    }

    const nodes: NodeInput<JobGraphPayload>[] = [];
    const edges: EdgeInput[] = [];

    for (const job of config.jobs) {
        const jobId = jobNodeId(job.name);

        for (const input of job.inputs) {
            const passed = input.passed ?? [];
            if (passed.length === 0) {
                const id = inputNodeId(job.name, input.name);
                nodes.push({
                    id,
                    payload: {
                        kind: 'input',
                        job: job.name,
                        input: input.name,
                        resource: input.resource ?? input.name,
                        trigger: input.trigger ?? false
                    }
                });
                edges.push({ from: id, to: jobId });
                continue;
            }

            for (const upstream of passed) {
                if (!jobNames.has(upstream)) {
                    throw new GraphInputError(
                        `Job ${job.name} input ${input.name} passed through unknown job ${upstream}`,
                        [jobId]
                    );
                }
                edges.push({ from: jobNodeId(upstream), to: jobId });
            }
        }

        nodes.push({ id: jobId, payload: { kind: 'job', job: job.name } });

        for (const output of job.outputs) {
            const id = outputNodeId(job.name, output.name);
            nodes.push({
                id,
                payload: {
                    kind: 'output',
                    job: job.name,
                    output: output.name,
                    resource: output.resource ?? output.name
                }
            });
            edges.push({ from: jobId, to: id });
        }
    }

    return { nodes, edges };
}

export interface LayoutJobsOptions {
    heightFn?: HeightFn<JobGraphPayload>;
    validate?: boolean;
    trace?: boolean;
}

/**
 * Lay out a pipeline's jobs on a grid.
 */
export function layoutJobs(
    config: PipelineConfig,
    options: LayoutJobsOptions = {}
): LayoutResult<JobGraphPayload> {
    const layoutConfig: Partial<LayoutConfig> = {};
    if (options.validate !== undefined) layoutConfig.validate = options.validate;
    if (options.trace !== undefined) layoutConfig.trace = options.trace;

    return runLayoutPipeline({
        graph: jobsToGraphInput(config),
        heightFn: options.heightFn,
        config: layoutConfig
    });
}
