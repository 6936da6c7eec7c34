/**
 * Step 5: Rasterize
 *
 * Walks a finished tree with a (row, col) cursor and writes it into a dense
 * matrix:
 * - serial: `before` at (row, col), `after` at (row, col + width(before))
 * - parallel: branches stacked down by the heights of the ones above
 * - leaf: node cell at (row, col), filled cells below for extra rows
 *
 * Positions never visited stay spacers.
 */

import { HeightFn } from '../../types.js';
import { LayoutTree, FILLED } from './types.js';
import { Matrix, type MatrixView } from './matrix.js';
import { width, height, nodeHeight } from './4-measure.js';

/**
 * Rasterize a tree into a height × width matrix.
 */
export function toMatrix<T>(heightFn: HeightFn<T>, tree: LayoutTree<T>): MatrixView<T> {
    const matrix = new Matrix<T>(height(heightFn, tree), width(tree));
    place(heightFn, 0, 0, matrix, tree);
    return matrix.seal();
}

function place<T>(
    heightFn: HeightFn<T>,
    row: number,
    col: number,
    matrix: Matrix<T>,
    tree: LayoutTree<T>
): void {
    switch (tree.kind) {
        case 'empty':
            return;

        case 'serial':
            place(heightFn, row, col, matrix, tree.before);
            place(heightFn, row, col + width(tree.before), matrix, tree.after);
            return;

        case 'parallel': {
            let branchRow = row;
            for (const branch of tree.branches) {
                place(heightFn, branchRow, col, matrix, branch);
                branchRow += height(heightFn, branch);
            }
            return;
        }

        case 'leaf': {
            matrix.set(row, col, { kind: 'node', node: tree.node });
            const rows = nodeHeight(heightFn, tree.node);
            for (let r = row + 1; r < row + rows; r++) {
                matrix.set(r, col, FILLED);
            }
            return;
        }
    }
}
