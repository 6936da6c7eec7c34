/**
 * Step 4: Measure Tree
 *
 * Computes the matrix size a tree needs:
 * - width  = columns (serial stages add up, parallel branches share columns)
 * - height = rows (parallel branches stack, serial stages share rows)
 *
 * Leaf height comes from the caller's height function.
 */

import { GraphNode, HeightFn } from '../../types.js';
import { LayoutTree, MeasureInput, MeasuredTree } from './types.js';
import { GraphInputError } from './errors.js';

/**
 * Measure a finished tree.
 */
export function measureTree<T>(input: MeasureInput<T>): MeasuredTree<T> {
    const { tree, heightFn } = input;
    return {
        tree,
        heightFn,
        width: width(tree),
        height: height(heightFn, tree)
    };
}

export function width<T>(tree: LayoutTree<T>): number {
    switch (tree.kind) {
        case 'empty':
            return 0;
        case 'leaf':
            return 1;
        case 'serial':
            return width(tree.before) + width(tree.after);
        case 'parallel':
            return tree.branches.reduce((max, branch) => Math.max(max, width(branch)), 0);
    }
}

export function height<T>(heightFn: HeightFn<T>, tree: LayoutTree<T>): number {
    switch (tree.kind) {
        case 'empty':
            return 0;
        case 'leaf':
            return nodeHeight(heightFn, tree.node);
        case 'serial':
            return Math.max(height(heightFn, tree.before), height(heightFn, tree.after));
        case 'parallel':
            return tree.branches.reduce((sum, branch) => sum + height(heightFn, branch), 0);
    }
}

/**
 * Rows reserved for one node. Rejects anything but a positive integer.
 */
export function nodeHeight<T>(heightFn: HeightFn<T>, node: GraphNode<T>): number {
    const rows = heightFn(node);
    if (!Number.isInteger(rows) || rows < 1) {
        throw new GraphInputError(
            `Height function returned ${rows} for node ${node.id}; expected a positive integer`,
            [node.id]
        );
    }
    return rows;
}
