/**
 * Step 3: Build Layout Tree
 *
 * Folds insert() over every node, level by level:
 * - Level 0 (roots) first, each becoming a concurrent branch
 * - Level k nodes only after all of level k-1
 * - Graph order inside a level
 *
 * The fold is sequential by nature: each insertion needs the previous tree.
 */

import { NodeId, GraphNode, StepGraph } from '../../types.js';
import { BuildTreeInput, LayoutTree, EMPTY } from './types.js';
import { insert } from './insert.js';
import { assignLevels } from './2-assign-levels.js';
import { GraphInputError, assertInvariant } from './errors.js';

/**
 * Build the layout tree of a leveled graph.
 */
export function buildLayoutTree<T>(input: BuildTreeInput<T>): LayoutTree<T> {
    const { leveled, onInsert } = input;
    const { graph, levels } = leveled;

    const inserted = new Set<NodeId>();
    let tree: LayoutTree<T> = EMPTY;

    for (let level = 0; level < levels.length; level++) {
        for (const id of levels[level]) {
            if (inserted.has(id)) {
                throw new GraphInputError(`Node ${id} inserted twice`, [id]);
            }
            const node = graph.nodes.get(id);
            if (!node) {
                throw new GraphInputError(`Level ${level} references unknown node ${id}`, [id]);
            }

            tree = insert(node, tree);
            inserted.add(id);

            assertInvariant(
                containsNode(tree, id),
                `node ${id} was dropped while inserting it into ${describeTree(tree)}`
            );
            onInsert?.({ node, level, tree });
        }
    }

    return tree;
}

/**
 * Level a graph and build its layout tree in one go.
 */
export function build<T>(graph: StepGraph<T>): LayoutTree<T> {
    return buildLayoutTree({ leveled: assignLevels({ graph }) });
}

/**
 * All nodes of a tree, in placement order (serial before, parallel top-down).
 */
export function collectNodes<T>(tree: LayoutTree<T>): GraphNode<T>[] {
    switch (tree.kind) {
        case 'empty':
            return [];
        case 'leaf':
            return [tree.node];
        case 'serial':
            return [...collectNodes(tree.before), ...collectNodes(tree.after)];
        case 'parallel':
            return tree.branches.flatMap(branch => collectNodes(branch));
    }
}

function containsNode<T>(tree: LayoutTree<T>, id: NodeId): boolean {
    switch (tree.kind) {
        case 'empty':
            return false;
        case 'leaf':
            return tree.node.id === id;
        case 'serial':
            return containsNode(tree.before, id) || containsNode(tree.after, id);
        case 'parallel':
            return tree.branches.some(branch => containsNode(branch, id));
    }
}

/**
 * Compact one-line notation, e.g. `([a | b] > c)`.
 * `>` joins serial stages, `|` separates parallel branches, `-` is empty.
 */
export function describeTree<T>(tree: LayoutTree<T>): string {
    switch (tree.kind) {
        case 'empty':
            return '-';
        case 'leaf':
            return tree.node.id;
        case 'serial':
            return `(${describeTree(tree.before)} > ${describeTree(tree.after)})`;
        case 'parallel':
            return `[${tree.branches.map(branch => describeTree(branch)).join(' | ')}]`;
    }
}
