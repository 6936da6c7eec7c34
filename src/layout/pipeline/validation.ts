/**
 * Layout Validation
 *
 * Checks layout invariants:
 * 1. Every graph node has exactly one node cell
 * 2. Every edge points to a column further right
 * 3. Matrix width equals the node count of the longest path
 * 4. Every filled cell hangs below a node cell
 */

import { NodeId, StepGraph } from '../../types.js';
import { LayoutResult, ValidationResult } from './types.js';
import type { MatrixView } from './matrix.js';

/**
 * Validate the final layout result.
 */
export function validateLayout<T>(result: LayoutResult<T>): ValidationResult {
    const errors: string[] = [];

    errors.push(...checkNodePlacement(result.graph, result.matrix));
    errors.push(...checkEdgeDirection(result.graph, result.matrix));
    errors.push(...checkWidth(result.graph, result.matrix));
    errors.push(...checkFilledCells(result.matrix));

    return {
        passed: errors.length === 0,
        errors
    };
}

/**
 * Each node appears as exactly one node cell, and nothing else does.
 */
function checkNodePlacement<T>(graph: StepGraph<T>, matrix: MatrixView<T>): string[] {
    const errors: string[] = [];
    const seen = new Map<NodeId, number>();

    for (const { node } of matrix.placedNodes()) {
        seen.set(node.id, (seen.get(node.id) ?? 0) + 1);
        if (!graph.nodes.has(node.id)) {
            errors.push(`Matrix holds unknown node: ${node.id}`);
        }
    }

    for (const id of graph.order) {
        const count = seen.get(id) ?? 0;
        if (count === 0) {
            errors.push(`Node missing from matrix: ${id}`);
        } else if (count > 1) {
            errors.push(`Node placed ${count} times: ${id}`);
        }
    }

    return errors;
}

/**
 * Upstream columns must be strictly left of downstream columns.
 */
function checkEdgeDirection<T>(graph: StepGraph<T>, matrix: MatrixView<T>): string[] {
    const errors: string[] = [];

    for (const node of graph.nodes.values()) {
        const from = matrix.positionOf(node.id);
        if (!from) continue;
        for (const downstreamId of node.outgoing) {
            const to = matrix.positionOf(downstreamId);
            if (!to) continue;
            if (from.col >= to.col) {
                errors.push(
                    `Edge ${node.id} -> ${downstreamId} does not move right: ` +
                    `column ${from.col} -> ${to.col}`
                );
            }
        }
    }

    return errors;
}

function checkWidth<T>(graph: StepGraph<T>, matrix: MatrixView<T>): string[] {
    const expected = longestPathNodeCount(graph);
    if (matrix.colCount !== expected) {
        return [`Matrix has ${matrix.colCount} column(s), longest path has ${expected} node(s)`];
    }
    return [];
}

/**
 * Node count of the longest root-to-sink path (0 for an empty graph).
 */
export function longestPathNodeCount<T>(graph: StepGraph<T>): number {
    const chain = new Map<NodeId, number>();

    const chainTo = (id: NodeId): number => {
        const known = chain.get(id);
        if (known !== undefined) return known;
        const node = graph.nodes.get(id);
        let longest = 0;
        if (node) {
            for (const upstreamId of node.incoming) {
                longest = Math.max(longest, chainTo(upstreamId));
            }
        }
        chain.set(id, longest + 1);
        return longest + 1;
    };

    let result = 0;
    for (const id of graph.order) {
        result = Math.max(result, chainTo(id));
    }
    return result;
}

function checkFilledCells<T>(matrix: MatrixView<T>): string[] {
    const errors: string[] = [];

    for (let row = 0; row < matrix.rowCount; row++) {
        for (let col = 0; col < matrix.colCount; col++) {
            if (matrix.get(row, col)?.kind !== 'filled') continue;
            const above = matrix.get(row - 1, col);
            if (!above || above.kind === 'spacer') {
                errors.push(`Filled cell at (${row}, ${col}) has no node above it`);
            }
        }
    }

    return errors;
}
