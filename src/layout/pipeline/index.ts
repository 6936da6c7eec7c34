/**
 * Layout Pipeline - Main Orchestrator
 *
 * Combines all 6 pipeline steps into a single layout computation.
 *
 * Pipeline:
 * 1. buildGraph()        → StepGraph
 * 2. assignLevels()      → LeveledGraph
 * 3. buildLayoutTree()   → LayoutTree
 * 4. measureTree()       → MeasuredTree
 * 5. toMatrix()          → Matrix
 * 6. emitLayoutResult()  → LayoutResult
 */

// Re-export types
export * from './types.js';
export * from './debug-types.js';
export * from './errors.js';
export { Matrix, type MatrixView, type PlacedNode } from './matrix.js';

// Re-export individual steps
export { buildGraph, countEdges } from './1-build-graph.js';
export { assignLevels, validateLevels } from './2-assign-levels.js';
export { buildLayoutTree, build, collectNodes, describeTree } from './3-build-tree.js';
export { measureTree, width, height, nodeHeight } from './4-measure.js';
export { toMatrix } from './5-rasterize.js';
export { emitLayoutResult } from './6-emit-result.js';
export {
    insert,
    addToStart,
    addAfterUpstreams,
    extractExclusiveUpstreams,
    addBeforeDownstream,
    type ExclusiveSplit
} from './insert.js';
export { leadsTo, comesDirectlyFrom } from './tree-predicates.js';
export { validateLayout, longestPathNodeCount } from './validation.js';

import { LayoutConfig, DEFAULT_LAYOUT_CONFIG, HeightFn } from '../../types.js';
import {
    PipelineInput,
    LayoutResult,
    LayoutRequest,
    LayoutEngine,
    InsertionStep
} from './types.js';

import {
    DebugOptions,
    DebugStep,
    DebugSnapshot,
    DebugPipelineResult,
    DEBUG_STEP_NAMES
} from './debug-types.js';

import { buildGraph } from './1-build-graph.js';
import { assignLevels } from './2-assign-levels.js';
import { buildLayoutTree, describeTree } from './3-build-tree.js';
import { measureTree } from './4-measure.js';
import { toMatrix } from './5-rasterize.js';
import { emitLayoutResult } from './6-emit-result.js';
import { validateLayout } from './validation.js';

/**
 * Merge caller overrides over the defaults.
 */
export function resolveConfig(config: Partial<LayoutConfig> = {}): LayoutConfig {
    return { ...DEFAULT_LAYOUT_CONFIG, ...config };
}

function resolveHeightFn<T>(heightFn: HeightFn<T> | undefined, config: LayoutConfig): HeightFn<T> {
    return heightFn ?? (() => config.defaultRowHeight);
}

function traceInsertion<T>(step: InsertionStep<T>): void {
    console.debug(`[layout] insert ${step.node.id} (level ${step.level}): ${describeTree(step.tree)}`);
}

/**
 * Validate (if enabled) and update diagnostics.
 * Failures land in diagnostics; they are logged only when tracing.
 */
function finishResult<T>(result: LayoutResult<T>, config: LayoutConfig): void {
    if (!config.validate) return;

    const validation = validateLayout(result);
    result.diagnostics.validationPassed = validation.passed;
    result.diagnostics.errors = validation.errors;
    if (config.trace && !validation.passed) {
        console.debug(`[layout] validation found ${validation.errors.length} error(s): ${validation.errors.join('; ')}`);
    }
}

/**
 * Run the complete layout pipeline.
 */
export function runLayoutPipeline<T>(input: PipelineInput<T>): LayoutResult<T> {
    const config = resolveConfig(input.config);
    const heightFn = resolveHeightFn(input.heightFn, config);

    // Step 1: Build graph
    const graph = buildGraph(input.graph);

    // Step 2: Assign levels
    const leveled = assignLevels({ graph });

    // Step 3: Build layout tree
    const tree = buildLayoutTree({
        leveled,
        onInsert: config.trace ? traceInsertion : undefined
    });

    // Step 4: Measure tree
    const measured = measureTree({ tree, heightFn });

    // Step 5: Rasterize
    const matrix = toMatrix(heightFn, tree);

    // Step 6: Emit result
    const result = emitLayoutResult({ leveled, measured, matrix });

    if (config.trace) {
        console.debug(`[layout] ${graph.nodes.size} node(s) in ${leveled.levels.length} level(s) -> ${matrix.rowCount}x${matrix.colCount} matrix`);
    }

    finishResult(result, config);
    return result;
}

/**
 * Run the layout pipeline with debug snapshots at each step.
 * Stops at the specified target step.
 */
export function runLayoutPipelineWithDebug<T>(
    input: PipelineInput<T>,
    debugOptions: DebugOptions
): DebugPipelineResult<T> {
    const snapshots: DebugSnapshot<T>[] = [];
    const { step: targetStep } = debugOptions;

    const config = resolveConfig(input.config);
    const heightFn = resolveHeightFn(input.heightFn, config);
    const insertions: InsertionStep<T>[] = [];

    // Step 1: Build graph
    const graph = buildGraph(input.graph);

    // Helper to create a snapshot
    const createSnapshot = (step: DebugStep, state: Partial<DebugSnapshot<T>>): DebugSnapshot<T> => ({
        step,
        stepName: DEBUG_STEP_NAMES[step],
        graph,
        leveled: state.leveled ?? null,
        tree: state.tree ?? null,
        insertions: [...insertions],
        measured: state.measured ?? null,
        matrix: state.matrix ?? null,
        result: state.result ?? null,
        validation: state.result ? validateLayout(state.result) : null
    });

    snapshots.push(createSnapshot(1, {}));
    if (targetStep === 1) {
        return { result: null, snapshots };
    }

    // Step 2: Assign levels
    const leveled = assignLevels({ graph });

    snapshots.push(createSnapshot(2, { leveled }));
    if (targetStep === 2) {
        return { result: null, snapshots };
    }

    // Step 3: Build layout tree, recording every insertion
    const tree = buildLayoutTree({
        leveled,
        onInsert: step => {
            insertions.push(step);
            if (config.trace) traceInsertion(step);
        }
    });

    snapshots.push(createSnapshot(3, { leveled, tree }));
    if (targetStep === 3) {
        return { result: null, snapshots };
    }

    // Step 4: Measure tree
    const measured = measureTree({ tree, heightFn });

    snapshots.push(createSnapshot(4, { leveled, tree, measured }));
    if (targetStep === 4) {
        return { result: null, snapshots };
    }

    // Step 5: Rasterize
    const matrix = toMatrix(heightFn, tree);

    snapshots.push(createSnapshot(5, { leveled, tree, measured, matrix }));
    if (targetStep === 5) {
        return { result: null, snapshots };
    }

    // Step 6: Emit result
    const result = emitLayoutResult({ leveled, measured, matrix });
    finishResult(result, config);

    snapshots.push(createSnapshot(6, { leveled, tree, measured, matrix, result }));

    return { result, snapshots };
}

/**
 * GridLayoutEngine - wrapper class implementing LayoutEngine interface.
 */
export class GridLayoutEngine implements LayoutEngine {
    private readonly defaults: Partial<LayoutConfig>;

    constructor(defaults: Partial<LayoutConfig> = {}) {
        this.defaults = defaults;
    }

    layout<T>(request: LayoutRequest<T>): LayoutResult<T> {
        return runLayoutPipeline({
            graph: request.graph,
            heightFn: request.heightFn,
            config: { ...this.defaults, ...request.config }
        });
    }
}

/**
 * Convenience function for computing a layout with a given engine.
 */
export function computeLayout<T>(
    engine: LayoutEngine,
    request: LayoutRequest<T>
): LayoutResult<T> {
    return engine.layout(request);
}
