/**
 * Debug Types for Layout Pipeline
 *
 * Type definitions for the debug mode that allows step-by-step
 * verification of layout computation.
 */

import { StepGraph } from '../../types.js';
import {
    LeveledGraph,
    LayoutTree,
    InsertionStep,
    MeasuredTree,
    LayoutResult,
    ValidationResult
} from './types.js';
import type { MatrixView } from './matrix.js';

// ==================== DEBUG OPTIONS ====================

/** Valid debug steps (1-6) */
export type DebugStep = 1 | 2 | 3 | 4 | 5 | 6;

export interface DebugOptions {
    step: DebugStep;
}

/** Step names for display */
export const DEBUG_STEP_NAMES: Record<DebugStep, string> = {
    1: 'Build Graph',
    2: 'Assign Levels',
    3: 'Build Tree',
    4: 'Measure Tree',
    5: 'Rasterize',
    6: 'Emit Result'
};

// ==================== DEBUG SNAPSHOT ====================

/** Pipeline state after one step; later fields stay null until reached. */
export interface DebugSnapshot<T> {
    step: DebugStep;
    stepName: string;
    graph: StepGraph<T>;
    leveled: LeveledGraph<T> | null;
    tree: LayoutTree<T> | null;
    insertions: InsertionStep<T>[];  // Tree after every insert() of step 3
    measured: MeasuredTree<T> | null;
    matrix: MatrixView<T> | null;
    result: LayoutResult<T> | null;
    validation: ValidationResult | null;
}

export interface DebugPipelineResult<T> {
    result: LayoutResult<T> | null;  // null when stopped before step 6
    snapshots: DebugSnapshot<T>[];
}
