/**
 * Step 1: Build Graph
 *
 * Turns the caller's node and edge lists into a StepGraph:
 * - Node ids must be unique
 * - Every edge must connect two known nodes
 * - Self-loops are rejected (a one-node cycle)
 * - Repeated edges collapse into one
 *
 * incoming/outgoing sets are derived from the same edge list, so they always
 * mirror each other.
 */

import { NodeId, GraphNode, StepGraph, toNodeId } from '../../types.js';
import { BuildGraphInput } from './types.js';
import { GraphInputError } from './errors.js';

/**
 * Build a validated graph from plain node and edge lists.
 */
export function buildGraph<T>(input: BuildGraphInput<T>): StepGraph<T> {
    const order: NodeId[] = [];
    const known = new Set<NodeId>();

    for (const node of input.nodes) {
        const id = toNodeId(node.id);
        if (known.has(id)) {
            throw new GraphInputError(`Duplicate node id: ${id}`, [id]);
        }
        known.add(id);
        order.push(id);
    }

    const incoming = new Map<NodeId, Set<NodeId>>();
    const outgoing = new Map<NodeId, Set<NodeId>>();
    for (const id of order) {
        incoming.set(id, new Set());
        outgoing.set(id, new Set());
    }

    for (const edge of input.edges) {
        const from = toNodeId(edge.from);
        const to = toNodeId(edge.to);

        const fromOut = outgoing.get(from);
        const toIn = incoming.get(to);
        if (!fromOut || !toIn) {
            const missing = [from, to].filter(id => !known.has(id));
            throw new GraphInputError(
                `Edge ${from} -> ${to} references unknown node(s): ${missing.join(', ')}`,
                missing
            );
        }
        if (from === to) {
            throw new GraphInputError(`Self-loop on node ${from}`, [from]);
        }

        fromOut.add(to);
        toIn.add(from);
    }

    const nodes = new Map<NodeId, GraphNode<T>>();
    for (const node of input.nodes) {
        const id = toNodeId(node.id);
        nodes.set(id, {
            id,
            payload: node.payload,
            incoming: incoming.get(id) ?? new Set(),
            outgoing: outgoing.get(id) ?? new Set()
        });
    }

    return { nodes, order };
}

/**
 * Number of distinct edges in the graph.
 */
export function countEdges<T>(graph: StepGraph<T>): number {
    let total = 0;
    for (const node of graph.nodes.values()) {
        total += node.outgoing.size;
    }
    return total;
}
