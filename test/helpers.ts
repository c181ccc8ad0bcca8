/**
 * Shared test fixtures
 */
import { expect } from 'vitest';
import { SocialGraph } from '../src/graph/social-graph.js';

export const SAMPLE_PATH = 'data/sample-network.yaml';

export const SAMPLE_PEOPLE = ['Alice', 'Bob', 'Carol', 'Dave', 'Eve', 'Frank'];

export const SAMPLE_FRIENDSHIPS: [string, string][] = [
  ['Alice', 'Bob'],
  ['Alice', 'Carol'],
  ['Bob', 'Dave'],
  ['Carol', 'Eve'],
  ['Eve', 'Frank'],
  ['Bob', 'Carol'],
  ['Dave', 'Frank'],
];

export function createGraph(people: string[], friendships: [string, string][] = [], capacity?: number): SocialGraph {
  const graph = new SocialGraph(capacity);
  people.forEach(name => graph.insertVertex(name));
  friendships.forEach(([a, b]) => graph.insertEdgeByName(a, b));
  return graph;
}

export function createSampleGraph(): SocialGraph {
  return createGraph(SAMPLE_PEOPLE, SAMPLE_FRIENDSHIPS);
}

/**
 * The adjacency lists and the matrix describe the same symmetric, loop-free relation
 */
export function expectConsistent(graph: SocialGraph): void {
  const matrix = graph.adjacencyMatrix();
  expect(matrix).toHaveLength(graph.size);

  for (let i = 0; i < graph.size; i++) {
    const neighbors = graph.neighbors(i);
    expect(new Set(neighbors).size).toBe(neighbors.length);
    expect(matrix[i][i]).toBe(false);

    const fromMatrix: number[] = [];
    for (let j = 0; j < graph.size; j++) {
      expect(matrix[i][j]).toBe(matrix[j][i]);
      if (matrix[i][j]) fromMatrix.push(j);
    }
    expect([...neighbors].sort((a, b) => a - b)).toEqual(fromMatrix);
  }
}

export function edgeNames(graph: SocialGraph): string[] {
  return graph.edges().map(([u, v]) => `${graph.vertexName(u)}-${graph.vertexName(v)}`);
}
