/**
 * Insertion Engine
 *
 * Places one graph node into a partially built LayoutTree as the earliest
 * stage strictly after everything that must precede it.
 *
 * All functions return new trees; their inputs are left untouched.
 */

import { GraphNode } from '../../types.js';
import { LayoutTree, EMPTY, leaf, serial, parallel } from './types.js';
import { leadsTo, comesDirectlyFrom } from './tree-predicates.js';
import { assertInvariant } from './errors.js';

/**
 * Result of extractExclusiveUpstreams().
 * `remainder` is null when nothing is left once exclusives are pulled out.
 */
export interface ExclusiveSplit<T> {
    remainder: LayoutTree<T> | null;
    exclusives: GraphNode<T>[];
}

/**
 * Insert a node: roots start a new concurrent branch,
 * everything else goes after its upstreams.
 */
export function insert<T>(node: GraphNode<T>, tree: LayoutTree<T>): LayoutTree<T> {
    if (node.incoming.size === 0) {
        return addToStart(leaf(node), tree);
    }
    return addAfterUpstreams(node, tree);
}

/**
 * Add `newBranch` as one more concurrent branch at the very start of `tree`.
 * Parallel sets on either side are flattened; empty is the identity.
 */
export function addToStart<T>(newBranch: LayoutTree<T>, tree: LayoutTree<T>): LayoutTree<T> {
    if (tree.kind === 'empty') return newBranch;
    if (newBranch.kind === 'empty') return tree;

    const added = newBranch.kind === 'parallel' ? newBranch.branches : [newBranch];
    if (tree.kind === 'parallel') {
        return parallel([...tree.branches, ...added]);
    }
    return parallel([tree, ...added]);
}

/**
 * Insert `node` right after the parts of `tree` that lead to it.
 */
export function addAfterUpstreams<T>(node: GraphNode<T>, tree: LayoutTree<T>): LayoutTree<T> {
    switch (tree.kind) {
        case 'empty':
            return EMPTY;

        case 'leaf':
            if (tree.node.outgoing.has(node.id)) {
                return serial(tree, leaf(node));
            }
            return tree;

        case 'serial':
            if (leadsTo(node, tree.before)) {
                return serial(tree.before, addToStart(leaf(node), tree.after));
            }
            return serial(tree.before, addAfterUpstreams(node, tree.after));

        case 'parallel': {
            const dependent: LayoutTree<T>[] = [];
            const rest: LayoutTree<T>[] = [];
            for (const branch of tree.branches) {
                if (leadsTo(node, branch)) {
                    dependent.push(branch);
                } else {
                    rest.push(branch);
                }
            }

            if (dependent.length === 0) {
                return tree;
            }
            if (dependent.length === 1) {
                return parallel([addAfterUpstreams(node, dependent[0]), ...rest]);
            }

            const merged = mergeConvergingBranches(node, dependent);
            if (rest.length === 0) {
                return merged;
            }
            return addToStart(parallel(rest), merged);
        }
    }
}

/**
 * Several branches feed `node`. Exclusive upstreams (nodes whose only edge
 * goes to `node`) are pulled out and re-inserted right before it.
 */
function mergeConvergingBranches<T>(node: GraphNode<T>, dependent: LayoutTree<T>[]): LayoutTree<T> {
    const { remainder, exclusives } = extractExclusiveUpstreams(node, parallel(dependent));

    if (remainder === null) {
        assertInvariant(
            exclusives.length > 0,
            `node ${node.id} converges from ${dependent.length} branches but has neither remainder nor exclusive upstreams`
        );
        // Every dependent path is a direct exclusive upstream
        return serial(parallel(exclusives.map(exclusive => leaf(exclusive))), leaf(node));
    }

    if (exclusives.length === 0) {
        return serial(parallel(dependent), leaf(node));
    }

    return exclusives.reduceRight<LayoutTree<T>>(
        (acc, exclusive) => addBeforeDownstream(exclusive, acc),
        addAfterUpstreams(node, remainder)
    );
}

/**
 * Split `tree` into the nodes whose only outgoing edge targets `target`
 * and whatever is left. Serial trees are never decomposed.
 */
export function extractExclusiveUpstreams<T>(target: GraphNode<T>, tree: LayoutTree<T>): ExclusiveSplit<T> {
    switch (tree.kind) {
        case 'empty':
            return { remainder: EMPTY, exclusives: [] };

        case 'leaf': {
            const source = tree.node;
            if (source.outgoing.size === 1 && source.outgoing.has(target.id)) {
                return { remainder: null, exclusives: [source] };
            }
            return { remainder: tree, exclusives: [] };
        }

        case 'serial':
            return { remainder: tree, exclusives: [] };

        case 'parallel': {
            const remainders: LayoutTree<T>[] = [];
            const exclusives: GraphNode<T>[] = [];
            for (const branch of tree.branches) {
                const split = extractExclusiveUpstreams(target, branch);
                if (split.remainder !== null) {
                    remainders.push(split.remainder);
                }
                exclusives.push(...split.exclusives);
            }

            if (remainders.length === 0) {
                return { remainder: null, exclusives };
            }
            return { remainder: parallel(remainders), exclusives };
        }
    }
}

/**
 * Insert `node` immediately upstream of the first part of `tree`
 * that depends on it directly.
 */
export function addBeforeDownstream<T>(node: GraphNode<T>, tree: LayoutTree<T>): LayoutTree<T> {
    switch (tree.kind) {
        case 'empty':
            return EMPTY;

        case 'parallel':
            if (comesDirectlyFrom(node, tree)) {
                return serial(leaf(node), tree);
            }
            return parallel(tree.branches.map(branch => addBeforeDownstream(node, branch)));

        case 'serial':
            if (comesDirectlyFrom(node, tree.after)) {
                return serial(addToStart(leaf(node), tree.before), tree.after);
            }
            return serial(tree.before, addBeforeDownstream(node, tree.after));

        case 'leaf':
            assertInvariant(
                !comesDirectlyFrom(node, tree),
                `too late to place ${node.id} before its downstream ${tree.node.id}`
            );
            return tree;
    }
}
