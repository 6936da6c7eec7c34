/**
 * Step 6: Emit Layout Result
 *
 * Final step: packages tree and matrix into the output LayoutResult.
 * - Collects the anchor position of every node
 * - Adds diagnostics
 */

import { NodeId } from '../../types.js';
import { EmitInput, LayoutResult, LayoutDiagnostics, MatrixPosition } from './types.js';
import { countEdges } from './1-build-graph.js';

/**
 * Emit the final layout result.
 */
export function emitLayoutResult<T>(input: EmitInput<T>): LayoutResult<T> {
    const { leveled, measured, matrix } = input;
    const { graph, levels } = leveled;

    const positions = new Map<NodeId, MatrixPosition>();
    for (const { node, row, col } of matrix.placedNodes()) {
        positions.set(node.id, { row, col });
    }

    const diagnostics: LayoutDiagnostics = {
        totalNodes: graph.nodes.size,
        totalEdges: countEdges(graph),
        levelCount: levels.length,
        rowCount: matrix.rowCount,
        colCount: matrix.colCount,
        validationPassed: true,  // Will be updated by validation step
        errors: []
    };

    return {
        graph,
        tree: measured.tree,
        matrix,
        positions,
        diagnostics
    };
}
