/**
 * Layout Errors
 *
 * GraphInputError      - the caller handed in a graph the engine cannot lay out.
 * LayoutInvariantError - the engine reached a state valid input never produces.
 */

import { NodeId } from '../../types.js';

export class GraphInputError extends Error {
    readonly nodeIds: NodeId[];

    constructor(message: string, nodeIds: NodeId[] = []) {
        super(message);
        this.name = 'GraphInputError';
        this.nodeIds = nodeIds;
    }
}

export class LayoutInvariantError extends Error {
    constructor(message: string) {
        super(`Layout invariant violated: ${message}`);
        this.name = 'LayoutInvariantError';
    }
}

/**
 * Hard assertion for internal invariants. Never caught inside the engine.
 */
export function assertInvariant(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new LayoutInvariantError(message);
    }
}
