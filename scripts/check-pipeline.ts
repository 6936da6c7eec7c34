#!/usr/bin/env npx tsx
/**
 * Standalone script for laying out a pipeline file and checking layout invariants.
 *
 * Usage:
 *   npm run check:pipeline -- ./path/to/pipeline.json
 *   PIPELINE_FILE=./path/to/pipeline.json npm run check:pipeline
 *
 * Prints the grid (job names, `|` under tall nodes, `.` for gaps) followed by
 * any validation failures.
 */

import * as fs from 'fs';
import * as path from 'path';
import { validatePipelineJson, layoutJobs, type JobGraphPayload, type PipelineConfig } from '../src/jobs/index.js';
import { GraphInputError, type LayoutResult, type MatrixView } from '../src/layout/index.js';

function cellLabel(matrix: MatrixView<JobGraphPayload>, row: number, col: number): string {
    const cell = matrix.get(row, col);
    if (!cell || cell.kind === 'spacer') return '.';
    if (cell.kind === 'filled') return '|';
    return cell.node.id;
}

function renderGrid(matrix: MatrixView<JobGraphPayload>): string[] {
    const labels: string[][] = [];
    for (let row = 0; row < matrix.rowCount; row++) {
        const line: string[] = [];
        for (let col = 0; col < matrix.colCount; col++) {
            line.push(cellLabel(matrix, row, col));
        }
        labels.push(line);
    }

    const widths: number[] = [];
    for (let col = 0; col < matrix.colCount; col++) {
        widths.push(Math.max(...labels.map(line => line[col].length)));
    }
    return labels.map(line => line.map((label, col) => label.padEnd(widths[col])).join('  ').trimEnd());
}

function exitInvalid(errors: string[]): never {
    console.error('Pipeline file is invalid:');
    for (const error of errors) {
        console.error(`  - ${error}`);
    }
    process.exit(1);
}

function layoutOrExit(config: PipelineConfig): LayoutResult<JobGraphPayload> {
    try {
        return layoutJobs(config, { validate: true });
    } catch (e) {
        if (e instanceof GraphInputError) {
            exitInvalid([e.message]);
        }
        throw e;
    }
}

function main() {
    const args = process.argv.slice(2);
    const filePath = args[0] || process.env.PIPELINE_FILE;

    if (!filePath) {
        console.error('Usage: npm run check:pipeline -- ./path/to/pipeline.json');
        console.error('   or: PIPELINE_FILE=./path/to/pipeline.json npm run check:pipeline');
        process.exit(1);
    }

    const resolvedPath = path.resolve(filePath);

    if (!fs.existsSync(resolvedPath)) {
        console.error(`File not found: ${resolvedPath}`);
        process.exit(1);
    }

    console.log(`\nLoading pipeline from: ${resolvedPath}\n`);

    const validation = validatePipelineJson(fs.readFileSync(resolvedPath, 'utf-8'));
    for (const warning of validation.warnings) {
        console.warn(`warning: ${warning}`);
    }
    if (!validation.config) {
        exitInvalid(validation.errors);
    }

    const result = layoutOrExit(validation.config);
    const { diagnostics } = result;

    console.log(`Found ${validation.config.jobs.length} jobs, ${diagnostics.totalNodes} nodes, ${diagnostics.totalEdges} edges\n`);
    for (const line of renderGrid(result.matrix)) {
        console.log(line);
    }
    console.log('');

    console.log('='.repeat(70));
    console.log(`SUMMARY: ${diagnostics.rowCount}x${diagnostics.colCount} grid, ${diagnostics.levelCount} level(s)`);
    console.log('='.repeat(70));

    if (diagnostics.validationPassed) {
        console.log('\nAll invariant checks passed!');
    } else {
        console.log('\nFailures:\n');
        for (const error of diagnostics.errors) {
            console.log(`  - ${error}`);
        }
    }

    process.exit(diagnostics.validationPassed ? 0 : 1);
}

main();
