/**
 * Insertion Engine Unit Tests
 *
 * Tests each insertion operation against hand-built trees:
 * - leadsTo / comesDirectlyFrom look at immediate edges only
 * - addToStart flattens parallel sets, empty is the identity
 * - addAfterUpstreams for leaf, serial and parallel trees
 * - extractExclusiveUpstreams pulls out single-edge upstreams
 * - addBeforeDownstream relocates a node right before its downstream
 * - Internal invariant violations throw LayoutInvariantError
 */

import { describe, it, expect } from 'vitest';
import { graphOf, nodeOf } from './helpers/graphs.js';
import {
    EMPTY,
    leaf,
    serial,
    parallel,
    leadsTo,
    comesDirectlyFrom,
    insert,
    addToStart,
    addAfterUpstreams,
    extractExclusiveUpstreams,
    addBeforeDownstream,
    describeTree,
    assertInvariant,
    LayoutInvariantError
} from '../pipeline/index.js';

describe('predicates', () => {
    const graph = graphOf(['A', 'B', 'C', 'D', 'X', 'Y', 'Z'], ['A>B', 'A>C', 'B>D', 'C>D', 'X>Y', 'Y>Z']);
    const n = (id: string) => nodeOf(graph, id);

    describe('leadsTo', () => {
        it('is true when a leaf has an edge into the node', () => {
            expect(leadsTo(n('B'), leaf(n('A')))).toBe(true);
            expect(leadsTo(n('D'), leaf(n('A')))).toBe(false);
        });

        it('searches both sides of a serial tree', () => {
            expect(leadsTo(n('D'), serial(leaf(n('A')), leaf(n('B'))))).toBe(true);
        });

        it('searches every parallel branch', () => {
            expect(leadsTo(n('D'), parallel([leaf(n('X')), leaf(n('C'))]))).toBe(true);
            expect(leadsTo(n('D'), parallel([leaf(n('X')), leaf(n('Y'))]))).toBe(false);
        });

        it('does not follow multi-hop chains', () => {
            expect(leadsTo(n('Z'), leaf(n('X')))).toBe(false);
            expect(leadsTo(n('Z'), serial(leaf(n('X')), leaf(n('Y'))))).toBe(true);
        });

        it('is false for an empty tree', () => {
            expect(leadsTo(n('B'), EMPTY)).toBe(false);
        });
    });

    describe('comesDirectlyFrom', () => {
        it('checks the incoming set of a leaf', () => {
            expect(comesDirectlyFrom(n('A'), leaf(n('B')))).toBe(true);
            expect(comesDirectlyFrom(n('B'), leaf(n('A')))).toBe(false);
        });

        it('only inspects the entry of a serial tree', () => {
            expect(comesDirectlyFrom(n('A'), serial(leaf(n('B')), leaf(n('D'))))).toBe(true);
            expect(comesDirectlyFrom(n('B'), serial(leaf(n('C')), leaf(n('D'))))).toBe(false);
        });

        it('accepts any parallel branch', () => {
            expect(comesDirectlyFrom(n('A'), parallel([leaf(n('D')), leaf(n('C'))]))).toBe(true);
        });

        it('is false for an empty tree', () => {
            expect(comesDirectlyFrom(n('A'), EMPTY)).toBe(false);
        });
    });
});

describe('addToStart', () => {
    const graph = graphOf(['A', 'B', 'C', 'D']);
    const n = (id: string) => nodeOf(graph, id);

    it('treats empty as the identity on both sides', () => {
        const a = leaf(n('A'));
        expect(addToStart(a, EMPTY)).toBe(a);
        expect(addToStart(EMPTY, a)).toBe(a);
    });

    it('wraps two non-parallel trees into a parallel set', () => {
        expect(describeTree(addToStart(leaf(n('B')), leaf(n('A'))))).toBe('[A | B]');
    });

    it('appends to an existing parallel set', () => {
        const tree = parallel([leaf(n('A')), leaf(n('B'))]);
        expect(describeTree(addToStart(leaf(n('C')), tree))).toBe('[A | B | C]');
    });

    it('flattens a parallel new branch', () => {
        const added = parallel([leaf(n('C')), leaf(n('D'))]);
        expect(describeTree(addToStart(added, parallel([leaf(n('A')), leaf(n('B'))])))).toBe('[A | B | C | D]');
        expect(describeTree(addToStart(added, leaf(n('A'))))).toBe('[A | C | D]');
    });

    it('keeps a serial tree as one branch', () => {
        const tree = serial(leaf(n('A')), leaf(n('B')));
        expect(describeTree(addToStart(leaf(n('C')), tree))).toBe('[(A > B) | C]');
    });

    it('does not modify its inputs', () => {
        const tree = parallel([leaf(n('A'))]);
        addToStart(leaf(n('B')), tree);
        expect(describeTree(tree)).toBe('[A]');
    });
});

describe('insert', () => {
    it('adds a root as a new concurrent branch', () => {
        const graph = graphOf(['A', 'B']);
        const tree = insert(nodeOf(graph, 'B'), leaf(nodeOf(graph, 'A')));
        expect(describeTree(tree)).toBe('[A | B]');
    });

    it('places a dependent node after its upstream', () => {
        const graph = graphOf(['A', 'B'], ['A>B']);
        const tree = insert(nodeOf(graph, 'B'), leaf(nodeOf(graph, 'A')));
        expect(describeTree(tree)).toBe('(A > B)');
    });
});

describe('addAfterUpstreams', () => {
    it('returns empty for an empty tree', () => {
        const graph = graphOf(['A', 'B'], ['A>B']);
        expect(addAfterUpstreams(nodeOf(graph, 'B'), EMPTY)).toBe(EMPTY);
    });

    it('leaves an unrelated leaf untouched', () => {
        const graph = graphOf(['A', 'B', 'C'], ['A>B']);
        const tree = leaf(nodeOf(graph, 'C'));
        expect(addAfterUpstreams(nodeOf(graph, 'B'), tree)).toBe(tree);
    });

    describe('serial trees', () => {
        it('starts the node alongside `after` when `before` leads to it', () => {
            const graph = graphOf(['A', 'B', 'C'], ['A>B', 'A>C']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = serial(leaf(n('A')), leaf(n('B')));

            expect(describeTree(addAfterUpstreams(n('C'), tree))).toBe('(A > [B | C])');
        });

        it('recurses into `after` otherwise', () => {
            const graph = graphOf(['A', 'B', 'C'], ['A>B', 'B>C']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = serial(leaf(n('A')), leaf(n('B')));

            expect(describeTree(addAfterUpstreams(n('C'), tree))).toBe('(A > (B > C))');
        });
    });

    describe('parallel trees', () => {
        it('returns the same tree when no branch leads to the node', () => {
            const graph = graphOf(['A', 'B', 'C', 'D'], ['C>D']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = parallel([leaf(n('A')), leaf(n('B'))]);

            expect(addAfterUpstreams(n('D'), tree)).toBe(tree);
        });

        it('recurses into a single dependent branch and puts it first', () => {
            const graph = graphOf(['A', 'B', 'C'], ['A>C']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = parallel([leaf(n('B')), leaf(n('A'))]);

            expect(describeTree(addAfterUpstreams(n('C'), tree))).toBe('[(A > C) | B]');
        });

        it('merges exclusive upstreams straight into the node', () => {
            const graph = graphOf(['A', 'B', 'C'], ['A>C', 'B>C']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = parallel([leaf(n('A')), leaf(n('B'))]);

            expect(describeTree(addAfterUpstreams(n('C'), tree))).toBe('([A | B] > C)');
        });

        it('converges plainly when no upstream is exclusive', () => {
            const graph = graphOf(['A', 'B', 'C', 'X', 'Y'], ['A>C', 'A>X', 'B>C', 'B>Y']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = parallel([leaf(n('A')), leaf(n('B'))]);

            expect(describeTree(addAfterUpstreams(n('C'), tree))).toBe('([A | B] > C)');
        });

        it('keeps unrelated branches next to the converged part', () => {
            const graph = graphOf(['A', 'B', 'C', 'E'], ['A>C', 'B>C']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = parallel([leaf(n('A')), leaf(n('E')), leaf(n('B'))]);

            expect(describeTree(addAfterUpstreams(n('C'), tree))).toBe('[([A | B] > C) | E]');
        });

        it('relocates an exclusive upstream next to the node when the rest is mixed', () => {
            const graph = graphOf(['A', 'B', 'C', 'D'], ['A>C', 'A>D', 'B>D']);
            const n = (id: string) => nodeOf(graph, id);
            const tree = parallel([serial(leaf(n('A')), leaf(n('C'))), leaf(n('B'))]);

            expect(describeTree(addAfterUpstreams(n('D'), tree))).toBe('[([A | B] > [C | D])]');
        });
    });
});

describe('extractExclusiveUpstreams', () => {
    const graph = graphOf(
        ['A', 'B', 'X', 'Y', 'T', 'U'],
        ['A>T', 'A>U', 'B>T', 'X>Y', 'Y>T']
    );
    const n = (id: string) => nodeOf(graph, id);

    it('keeps an empty tree as remainder', () => {
        expect(extractExclusiveUpstreams(n('T'), EMPTY)).toEqual({ remainder: EMPTY, exclusives: [] });
    });

    it('extracts a leaf whose only edge targets the node', () => {
        const split = extractExclusiveUpstreams(n('T'), leaf(n('B')));
        expect(split.remainder).toBeNull();
        expect(split.exclusives.map(node => node.id)).toEqual(['B']);
    });

    it('keeps a leaf with other edges', () => {
        const tree = leaf(n('A'));
        const split = extractExclusiveUpstreams(n('T'), tree);
        expect(split.remainder).toBe(tree);
        expect(split.exclusives).toEqual([]);
    });

    it('keeps a leaf whose single edge goes elsewhere', () => {
        const split = extractExclusiveUpstreams(n('T'), leaf(n('X')));
        expect(split.exclusives).toEqual([]);
    });

    it('never decomposes serial trees', () => {
        const tree = serial(leaf(n('X')), leaf(n('Y')));
        const split = extractExclusiveUpstreams(n('T'), tree);
        expect(split.remainder).toBe(tree);
        expect(split.exclusives).toEqual([]);
    });

    it('splits parallel branches into remainder and exclusives', () => {
        const tree = parallel([leaf(n('A')), leaf(n('B')), serial(leaf(n('X')), leaf(n('Y')))]);
        const split = extractExclusiveUpstreams(n('T'), tree);

        expect(split.remainder && describeTree(split.remainder)).toBe('[A | (X > Y)]');
        expect(split.exclusives.map(node => node.id)).toEqual(['B']);
    });

    it('returns no remainder when every branch is exclusive', () => {
        const graph2 = graphOf(['P', 'Q', 'R'], ['P>R', 'Q>R']);
        const tree = parallel([leaf(nodeOf(graph2, 'P')), leaf(nodeOf(graph2, 'Q'))]);
        const split = extractExclusiveUpstreams(nodeOf(graph2, 'R'), tree);

        expect(split.remainder).toBeNull();
        expect(split.exclusives.map(node => node.id)).toEqual(['P', 'Q']);
    });
});

describe('addBeforeDownstream', () => {
    const graph = graphOf(['A', 'B', 'C', 'D'], ['A>C', 'B>D']);
    const n = (id: string) => nodeOf(graph, id);

    it('returns empty for an empty tree', () => {
        expect(addBeforeDownstream(n('B'), EMPTY)).toBe(EMPTY);
    });

    it('goes in front of a parallel set that starts with a downstream', () => {
        const tree = parallel([leaf(n('C')), leaf(n('D'))]);
        expect(describeTree(addBeforeDownstream(n('B'), tree))).toBe('(B > [C | D])');
    });

    it('joins `before` of a serial tree whose `after` starts with a downstream', () => {
        const tree = serial(leaf(n('A')), parallel([leaf(n('C')), leaf(n('D'))]));
        expect(describeTree(addBeforeDownstream(n('B'), tree))).toBe('([A | B] > [C | D])');
    });

    it('descends into `after` until it finds the downstream', () => {
        const tree = serial(leaf(n('A')), serial(leaf(n('C')), leaf(n('D'))));
        expect(describeTree(addBeforeDownstream(n('B'), tree))).toBe('(A > ([C | B] > D))');
    });

    it('maps over parallel branches that do not start with a downstream', () => {
        const tree = parallel([serial(leaf(n('A')), leaf(n('D'))), leaf(n('C'))]);
        expect(describeTree(addBeforeDownstream(n('B'), tree))).toBe('[([A | B] > D) | C]');
    });

    it('leaves unrelated leaves untouched', () => {
        const tree = leaf(n('C'));
        expect(addBeforeDownstream(n('B'), tree)).toBe(tree);
    });

    it('fails when it reaches a leaf that already depends on the node', () => {
        expect(() => addBeforeDownstream(n('B'), leaf(n('D')))).toThrow(LayoutInvariantError);
        expect(() => addBeforeDownstream(n('B'), leaf(n('D')))).toThrow(
            'Layout invariant violated: too late to place B before its downstream D'
        );
    });
});

describe('assertInvariant', () => {
    it('passes silently when the condition holds', () => {
        expect(() => assertInvariant(true, 'unused')).not.toThrow();
    });

    it('throws LayoutInvariantError otherwise', () => {
        expect(() => assertInvariant(false, 'broken')).toThrow(LayoutInvariantError);
        expect(() => assertInvariant(false, 'broken')).toThrow('Layout invariant violated: broken');
    });
});
