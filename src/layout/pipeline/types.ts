/**
 * Layout Pipeline Types
 * Complete type definitions for the 6-step grid layout pipeline.
 */

import { NodeId, GraphNode, GraphInput, StepGraph, HeightFn, LayoutConfig } from '../../types.js';
import type { MatrixView } from './matrix.js';

// ==================== LAYOUT TREE ====================

/**
 * LayoutTree - nested serial/parallel composition of graph nodes.
 * Matched exhaustively on `kind`; values are never mutated after construction.
 */
export type LayoutTree<T> = EmptyTree | LeafTree<T> | SerialTree<T> | ParallelTree<T>;

/** No content. Identity element for addToStart(). */
export interface EmptyTree {
    readonly kind: 'empty';
}

/** Exactly one graph node. */
export interface LeafTree<T> {
    readonly kind: 'leaf';
    readonly node: GraphNode<T>;
}

/** `before` fully precedes `after`. */
export interface SerialTree<T> {
    readonly kind: 'serial';
    readonly before: LayoutTree<T>;
    readonly after: LayoutTree<T>;
}

/** Concurrent branches, stacked top to bottom in this order. */
export interface ParallelTree<T> {
    readonly kind: 'parallel';
    readonly branches: readonly LayoutTree<T>[];
}

export const EMPTY: EmptyTree = { kind: 'empty' };

export function leaf<T>(node: GraphNode<T>): LeafTree<T> {
    return { kind: 'leaf', node };
}

export function serial<T>(before: LayoutTree<T>, after: LayoutTree<T>): SerialTree<T> {
    return { kind: 'serial', before, after };
}

export function parallel<T>(branches: readonly LayoutTree<T>[]): ParallelTree<T> {
    return { kind: 'parallel', branches };
}

// ==================== MATRIX CELLS ====================

/** Anchor cell of a node (its top row). */
export interface NodeCell<T> {
    readonly kind: 'node';
    readonly node: GraphNode<T>;
}

/** Row claimed by a multi-row node above. */
export interface FilledCell {
    readonly kind: 'filled';
}

/** Unused position. */
export interface SpacerCell {
    readonly kind: 'spacer';
}

export type MatrixCell<T> = NodeCell<T> | FilledCell | SpacerCell;

export const FILLED: FilledCell = { kind: 'filled' };
export const SPACER: SpacerCell = { kind: 'spacer' };

export interface MatrixPosition {
    row: number;
    col: number;
}

// ==================== STEP 1: BUILD GRAPH ====================

export type BuildGraphInput<T> = GraphInput<T>;

// ==================== STEP 2: ASSIGN LEVELS ====================

/**
 * Input for assignLevels step.
 */
export interface AssignLevelsInput<T> {
    graph: StepGraph<T>;
}

/**
 * LeveledGraph - graph partitioned by longest predecessor chain.
 * levels[0] holds the roots; each level keeps the graph's node order.
 */
export interface LeveledGraph<T> {
    graph: StepGraph<T>;
    levels: NodeId[][];
    nodeLevel: Map<NodeId, number>;
    maxLevel: number;  // -1 for an empty graph
}

// ==================== STEP 3: BUILD TREE ====================

/** One insert() call, reported to BuildTreeInput.onInsert. */
export interface InsertionStep<T> {
    node: GraphNode<T>;
    level: number;
    tree: LayoutTree<T>;  // Tree after inserting `node`
}

/**
 * Input for buildLayoutTree step.
 */
export interface BuildTreeInput<T> {
    leveled: LeveledGraph<T>;
    onInsert?: (step: InsertionStep<T>) => void;
}

// ==================== STEP 4: MEASURE ====================

/**
 * Input for measureTree step.
 */
export interface MeasureInput<T> {
    tree: LayoutTree<T>;
    heightFn: HeightFn<T>;
}

export interface MeasuredTree<T> {
    tree: LayoutTree<T>;
    heightFn: HeightFn<T>;
    width: number;   // Columns
    height: number;  // Rows
}

// ==================== STEP 6: EMIT RESULT ====================

/**
 * Input for emitLayoutResult step.
 */
export interface EmitInput<T> {
    leveled: LeveledGraph<T>;
    measured: MeasuredTree<T>;
    matrix: MatrixView<T>;
}

export interface LayoutDiagnostics {
    totalNodes: number;
    totalEdges: number;
    levelCount: number;
    rowCount: number;
    colCount: number;
    validationPassed: boolean;
    errors: string[];
}

export interface LayoutResult<T> {
    graph: StepGraph<T>;
    tree: LayoutTree<T>;
    matrix: MatrixView<T>;
    positions: Map<NodeId, MatrixPosition>;
    diagnostics: LayoutDiagnostics;
}

export interface ValidationResult {
    passed: boolean;
    errors: string[];
}

// ==================== PIPELINE ====================

/**
 * Input for the full pipeline.
 */
export interface PipelineInput<T> {
    graph: GraphInput<T>;
    heightFn?: HeightFn<T>;
    config?: Partial<LayoutConfig>;
}

export type LayoutRequest<T> = PipelineInput<T>;

/**
 * Layout engine interface.
 */
export interface LayoutEngine {
    layout<T>(request: LayoutRequest<T>): LayoutResult<T>;
}
