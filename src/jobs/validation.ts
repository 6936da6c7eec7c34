/**
 * Pipeline Jobs - Validation Module
 * Validates a JSON pipeline description before layout
 */

import { PipelineConfig, JobConfig, JobInput, JobOutput, PipelineValidationResult } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validate JSON pipeline content.
 * Checks structure, required fields, and job references.
 */
export function validatePipelineJson(content: string): PipelineValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    // 1. Parse JSON
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        return { valid: false, errors: [`invalidJson:${reason}`], warnings };
    }

    // 2. Check basic structure
    if (!isRecord(parsed)) {
        return { valid: false, errors: ['invalidStructure'], warnings };
    }
    if (!Array.isArray(parsed.jobs)) {
        return { valid: false, errors: ['missingJobs'], warnings };
    }

    // 3. Validate jobs
    const jobs: JobConfig[] = [];
    const jobNames = new Set<string>();

    parsed.jobs.forEach((raw: unknown, index: number) => {
        if (!isRecord(raw) || typeof raw.name !== 'string' || raw.name === '') {
            errors.push(`missingJobName:${index}`);
            return;
        }
        const name = raw.name;
        if (jobNames.has(name)) {
            errors.push(`duplicateJob:${name}`);
            return;
        }
        jobNames.add(name);

        const inputs: JobInput[] = [];
        const rawInputs: unknown[] = Array.isArray(raw.inputs) ? raw.inputs : [];
        for (const rawInput of rawInputs) {
            if (!isRecord(rawInput) || typeof rawInput.name !== 'string') {
                errors.push(`invalidInput:${name}`);
                continue;
            }
            const passed = rawInput.passed;
            if (passed !== undefined && !isStringArray(passed)) {
                errors.push(`invalidPassed:${name}:${rawInput.name}`);
                continue;
            }
            inputs.push({
                name: rawInput.name,
                resource: typeof rawInput.resource === 'string' ? rawInput.resource : undefined,
                passed: isStringArray(passed) ? passed : undefined,
                trigger: rawInput.trigger === true
            });
        }

        const outputs: JobOutput[] = [];
        const rawOutputs: unknown[] = Array.isArray(raw.outputs) ? raw.outputs : [];
        for (const rawOutput of rawOutputs) {
            if (!isRecord(rawOutput) || typeof rawOutput.name !== 'string') {
                errors.push(`invalidOutput:${name}`);
                continue;
            }
            outputs.push({
                name: rawOutput.name,
                resource: typeof rawOutput.resource === 'string' ? rawOutput.resource : undefined
            });
        }

        if (inputs.length === 0 && outputs.length === 0) {
            warnings.push(`isolatedJob:${name}`);
        }

        jobs.push({ name, inputs, outputs });
    });

    // 4. Reference validation
    for (const job of jobs) {
        for (const name of duplicateNames(job.inputs)) {
            errors.push(`duplicateInput:${job.name}:${name}`);
        }
        for (const name of duplicateNames(job.outputs)) {
            errors.push(`duplicateOutput:${job.name}:${name}`);
        }
        for (const input of job.inputs) {
            for (const upstream of input.passed ?? []) {
                if (upstream === job.name) {
                    errors.push(`selfPassed:${job.name}:${input.name}`);
                } else if (!jobNames.has(upstream)) {
                    errors.push(`unknownPassedJob:${job.name}:${input.name}:${upstream}`);
                }
            }
        }
    }

    // 5. Passed constraints must not loop
    const cyclic = jobsOnPassedCycle(jobs, jobNames);
    if (cyclic.length > 0) {
        errors.push(`passedCycle:${cyclic.join(',')}`);
    }

    if (errors.length > 0) {
        return { valid: false, errors, warnings };
    }

    const config: PipelineConfig = { jobs };
    return { valid: true, errors, warnings, config };
}

function duplicateNames(items: { name: string }[]): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const { name } of items) {
        if (seen.has(name)) duplicates.add(name);
        seen.add(name);
    }
    return [...duplicates];
}

/**
 * Jobs that sit on or behind a `passed` cycle, in config order.
 * Self and unknown references are reported elsewhere and ignored here.
 */
function jobsOnPassedCycle(jobs: JobConfig[], jobNames: Set<string>): string[] {
    const remaining = new Map<string, number>();
    const downstream = new Map<string, string[]>();

    for (const job of jobs) {
        const upstreams = new Set<string>();
        for (const input of job.inputs) {
            for (const upstream of input.passed ?? []) {
                if (upstream !== job.name && jobNames.has(upstream)) {
                    upstreams.add(upstream);
                }
            }
        }
        remaining.set(job.name, upstreams.size);
        for (const upstream of upstreams) {
            const list = downstream.get(upstream) ?? [];
            list.push(job.name);
            downstream.set(upstream, list);
        }
    }

    const ready = jobs.filter(job => remaining.get(job.name) === 0).map(job => job.name);
    const done = new Set<string>();
    while (ready.length > 0) {
        const name = ready.pop();
        if (name === undefined || done.has(name)) continue;
        done.add(name);
        for (const next of downstream.get(name) ?? []) {
            const left = (remaining.get(next) ?? 0) - 1;
            remaining.set(next, left);
            if (left === 0) ready.push(next);
        }
    }

    return jobs.map(job => job.name).filter(name => !done.has(name));
}
