/**
 * Layout Module Entry Point
 *
 * Provides a clean API for laying out step graphs on a grid.
 * Uses a modular 6-step pipeline architecture.
 *
 * Usage:
 *   import { computeLayout, GridLayoutEngine } from './layout/index.js';
 *
 *   const engine = new GridLayoutEngine();
 *   const result = computeLayout(engine, { graph: { nodes, edges } });
 *
 * Pipeline steps:
 *   1. buildGraph()        → StepGraph
 *   2. assignLevels()      → LeveledGraph
 *   3. buildLayoutTree()   → LayoutTree
 *   4. measureTree()       → MeasuredTree
 *   5. toMatrix()          → Matrix
 *   6. emitLayoutResult()  → LayoutResult
 */

// Re-export everything from pipeline
export * from './pipeline/index.js';
