/**
 * Step Grid - Type Definitions
 * Branded types for type-safe IDs and the graph input model
 */

// ==================== BRANDED TYPES ====================

/** Branded type for graph node IDs - prevents mixing with other string IDs */
export type NodeId = string & { readonly __brand: 'NodeId' };

/** Helper to create a NodeId from string */
export function toNodeId(id: string): NodeId {
    return id as NodeId;
}

// ==================== GRAPH INPUT ====================

/**
 * A node as supplied by the caller, before validation.
 */
export interface NodeInput<T> {
    id: string;
    payload: T;
}

/** Directed dependency: `from` must complete before `to`. */
export interface EdgeInput {
    from: string;
    to: string;
}

export interface GraphInput<T> {
    nodes: NodeInput<T>[];
    edges: EdgeInput[];
}

// ==================== GRAPH ====================

/**
 * GraphNode - one step of the DAG with its immediate neighbours.
 * Both sets hold direct neighbours only.
 */
export interface GraphNode<T> {
    readonly id: NodeId;
    readonly payload: T;
    readonly incoming: ReadonlySet<NodeId>;
    readonly outgoing: ReadonlySet<NodeId>;
}

/**
 * StepGraph - validated graph snapshot.
 * `order` keeps the caller's node order; levels are sorted by it.
 */
export interface StepGraph<T> {
    nodes: Map<NodeId, GraphNode<T>>;
    order: NodeId[];
}

// ==================== LAYOUT CONFIG ====================

/** Vertical space (in matrix rows) reserved for a node. Must be a positive integer. */
export type HeightFn<T> = (node: GraphNode<T>) => number;

export interface LayoutConfig {
    defaultRowHeight: number;  // Rows per node when no height function is given
    validate: boolean;         // Run validateLayout() on the emitted result
    trace: boolean;            // Log every insertion to the console
}

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
    defaultRowHeight: 1,
    validate: true,
    trace: false
};
