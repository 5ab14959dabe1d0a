import { DirectedGraph } from 'graphology';
import type { ChainViolation, ChainViolationKind } from '../types/index.js';
import type { SupersedesEdge } from '../storage/database.js';

/** Default hop bound for supersedes_id walks. */
export const DEFAULT_MAX_CHAIN_DEPTH = 20;

export interface ChainWalk {
    status: 'terminated' | ChainViolationKind;
    /** Nodes visited, starting with the start node */
    path: number[];
}

/**
 * Build a directed graph with one edge per `id → supersedes_id` link.
 */
export function buildSupersessionGraph(edges: SupersedesEdge[]): DirectedGraph {
    const graph = new DirectedGraph({ allowSelfLoops: true });
    for (const edge of edges) {
        graph.mergeEdge(String(edge.id), String(edge.supersedes_id));
    }
    return graph;
}

/**
 * Follow `supersedes_id` links from `start`.
 *
 * A revisited node is a `cycle`. A walk needing more than `maxDepth` hops is
 * `depth_exceeded`, which callers treat as a cycle: real supersession chains
 * are never that deep.
 */
export function walkChain(graph: DirectedGraph, start: number, maxDepth = DEFAULT_MAX_CHAIN_DEPTH): ChainWalk {
    const path = [start];
    const visited = new Set<string>([String(start)]);
    let node = String(start);
    let hops = 0;

    while (graph.hasNode(node)) {
        const next = graph.outNeighbors(node)[0];
        if (next === undefined) break;

        hops++;
        if (visited.has(next)) {
            path.push(Number(next));
            return { status: 'cycle', path };
        }
        if (hops > maxDepth) {
            return { status: 'depth_exceeded', path };
        }

        visited.add(next);
        path.push(Number(next));
        node = next;
    }

    return { status: 'terminated', path };
}

/**
 * Walk every chain start and return the ones that do not terminate within the bound.
 */
export function findChainViolations(edges: SupersedesEdge[], maxDepth = DEFAULT_MAX_CHAIN_DEPTH): ChainViolation[] {
    const graph = buildSupersessionGraph(edges);
    const violations: ChainViolation[] = [];

    for (const { id } of edges) {
        const walk = walkChain(graph, id, maxDepth);
        if (walk.status !== 'terminated') {
            violations.push({ start: id, kind: walk.status, path: walk.path });
        }
    }

    return violations;
}
