/**
 * Step 2: Assign Levels
 *
 * Partitions nodes into height levels:
 * - Roots (no incoming edges) = level 0
 * - Any other node = 1 + highest level among its predecessors
 *   (length of its longest predecessor chain)
 *
 * Nodes inside a level keep the graph's original order.
 * A node that never becomes ready belongs to (or hangs off) a cycle.
 */

import { NodeId } from '../../types.js';
import { AssignLevelsInput, LeveledGraph } from './types.js';
import { GraphInputError } from './errors.js';

/**
 * Assign a height level to every node (Kahn's algorithm, longest path).
 */
export function assignLevels<T>(input: AssignLevelsInput<T>): LeveledGraph<T> {
    const { graph } = input;

    const remainingIn = new Map<NodeId, number>();
    const nodeLevel = new Map<NodeId, number>();
    const queue: NodeId[] = [];

    for (const id of graph.order) {
        const node = graph.nodes.get(id);
        if (!node) continue;
        remainingIn.set(id, node.incoming.size);
        if (node.incoming.size === 0) {
            nodeLevel.set(id, 0);
            queue.push(id);
        }
    }

    let head = 0;
    while (head < queue.length) {
        const id = queue[head++];
        const level = nodeLevel.get(id) ?? 0;
        const node = graph.nodes.get(id);
        if (!node) continue;

        for (const downstreamId of node.outgoing) {
            const current = nodeLevel.get(downstreamId);
            if (current === undefined || current < level + 1) {
                nodeLevel.set(downstreamId, level + 1);
            }

            const left = (remainingIn.get(downstreamId) ?? 0) - 1;
            remainingIn.set(downstreamId, left);
            if (left === 0) {
                queue.push(downstreamId);
            }
        }
    }

    if (queue.length < graph.order.length) {
        const ordered = new Set(queue);
        const stuck = graph.order.filter(id => !ordered.has(id));
        throw new GraphInputError(
            `Graph is not acyclic: ${stuck.length} node(s) sit on or behind a cycle: ${stuck.join(', ')}`,
            stuck
        );
    }

    // Build levels in graph order
    let maxLevel = -1;
    for (const level of nodeLevel.values()) {
        maxLevel = Math.max(maxLevel, level);
    }

    const levels: NodeId[][] = [];
    for (let level = 0; level <= maxLevel; level++) {
        levels.push([]);
    }
    for (const id of graph.order) {
        const level = nodeLevel.get(id);
        if (level !== undefined) {
            levels[level].push(id);
        }
    }

    return {
        graph,
        levels,
        nodeLevel,
        maxLevel
    };
}

/**
 * Validate level assignments.
 * Returns list of errors (empty if valid).
 */
export function validateLevels<T>(leveled: LeveledGraph<T>): string[] {
    const errors: string[] = [];
    const { graph, nodeLevel } = leveled;

    for (const node of graph.nodes.values()) {
        const level = nodeLevel.get(node.id);
        if (level === undefined) {
            errors.push(`Missing level for node ${node.id}`);
            continue;
        }

        // Check: all edges go from a lower level to a higher one
        let highestUpstream = -1;
        for (const upstreamId of node.incoming) {
            const upstreamLevel = nodeLevel.get(upstreamId);
            if (upstreamLevel === undefined) continue;
            highestUpstream = Math.max(highestUpstream, upstreamLevel);
            if (upstreamLevel >= level) {
                errors.push(
                    `Level order violated: ${upstreamId} (level ${upstreamLevel}) ` +
                    `-> ${node.id} (level ${level})`
                );
            }
        }

        // Check: node sits right below its deepest predecessor
        if (level !== highestUpstream + 1) {
            errors.push(
                `Node ${node.id} at level ${level}, expected level ${highestUpstream + 1}`
            );
        }
    }

    return errors;
}
