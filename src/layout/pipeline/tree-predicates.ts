/**
 * Structural queries over a LayoutTree.
 *
 * Both checks look at immediate edges only. leadsTo() does not follow
 * multi-hop chains, and comesDirectlyFrom() only looks at the entry boundary
 * of a subtree. The insertion rules depend on exactly this behaviour.
 */

import { GraphNode } from '../../types.js';
import { LayoutTree } from './types.js';

/**
 * True if some leaf of `tree` has an edge straight into `node`.
 */
export function leadsTo<T>(node: GraphNode<T>, tree: LayoutTree<T>): boolean {
    switch (tree.kind) {
        case 'empty':
            return false;
        case 'leaf':
            return tree.node.outgoing.has(node.id);
        case 'serial':
            return leadsTo(node, tree.before) || leadsTo(node, tree.after);
        case 'parallel':
            return tree.branches.some(branch => leadsTo(node, branch));
    }
}

/**
 * True if a node at the start of `tree` depends directly on `node`.
 * For serial trees only `before` is inspected.
 */
export function comesDirectlyFrom<T>(node: GraphNode<T>, tree: LayoutTree<T>): boolean {
    switch (tree.kind) {
        case 'empty':
            return false;
        case 'leaf':
            return tree.node.incoming.has(node.id);
        case 'serial':
            return comesDirectlyFrom(node, tree.before);
        case 'parallel':
            return tree.branches.some(branch => comesDirectlyFrom(node, branch));
    }
}
