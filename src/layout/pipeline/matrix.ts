/**
 * Matrix - dense row/column grid of rendering cells.
 *
 * Created pre-filled with spacers. Only the rasterizer writes to it, each
 * position may be written once, and seal() ends all writes.
 */

import { NodeId, GraphNode } from '../../types.js';
import { MatrixCell, MatrixPosition, SPACER } from './types.js';
import { assertInvariant } from './errors.js';

export interface PlacedNode<T> extends MatrixPosition {
    node: GraphNode<T>;
}

/** Read-only side of a Matrix, as handed to renderers. */
export interface MatrixView<T> {
    readonly rowCount: number;
    readonly colCount: number;
    get(row: number, col: number): MatrixCell<T> | undefined;
    positionOf(id: NodeId): MatrixPosition | undefined;
    rows(): MatrixCell<T>[][];
    placedNodes(): PlacedNode<T>[];
}

export class Matrix<T> implements MatrixView<T> {
    readonly rowCount: number;
    readonly colCount: number;

    private readonly cells: MatrixCell<T>[][];
    private readonly anchors = new Map<NodeId, MatrixPosition>();
    private sealed = false;

    constructor(rowCount: number, colCount: number) {
        this.rowCount = rowCount;
        this.colCount = colCount;
        this.cells = [];
        for (let row = 0; row < rowCount; row++) {
            this.cells.push(new Array<MatrixCell<T>>(colCount).fill(SPACER));
        }
    }

    /**
     * Cell at (row, col), or undefined outside the grid.
     */
    get(row: number, col: number): MatrixCell<T> | undefined {
        return this.cells[row]?.[col];
    }

    set(row: number, col: number, cell: MatrixCell<T>): void {
        assertInvariant(!this.sealed, `cell (${row}, ${col}) written after the matrix was sealed`);
        const current = this.get(row, col);
        assertInvariant(current !== undefined, `cell (${row}, ${col}) is outside a ${this.rowCount}x${this.colCount} matrix`);
        assertInvariant(current.kind === 'spacer', `cell (${row}, ${col}) assigned twice`);

        this.cells[row][col] = cell;
        if (cell.kind === 'node') {
            assertInvariant(!this.anchors.has(cell.node.id), `node ${cell.node.id} placed twice`);
            this.anchors.set(cell.node.id, { row, col });
        }
    }

    /** Stop accepting writes. */
    seal(): MatrixView<T> {
        this.sealed = true;
        return this;
    }

    /** Anchor position of a node, if it was placed. */
    positionOf(id: NodeId): MatrixPosition | undefined {
        return this.anchors.get(id);
    }

    /** Copy of all rows, top to bottom. */
    rows(): MatrixCell<T>[][] {
        return this.cells.map(row => [...row]);
    }

    /** Node cells in row-major order. */
    placedNodes(): PlacedNode<T>[] {
        const placed: PlacedNode<T>[] = [];
        for (let row = 0; row < this.rowCount; row++) {
            for (let col = 0; col < this.colCount; col++) {
                const cell = this.cells[row][col];
                if (cell.kind === 'node') {
                    placed.push({ node: cell.node, row, col });
                }
            }
        }
        return placed;
    }
}
