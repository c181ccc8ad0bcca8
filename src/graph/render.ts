/**
 * Text renderings of a social graph: adjacency list, adjacency matrix,
 * incidence matrix and a plain friend listing
 */
import type { SocialGraph } from './social-graph.js';
import type { IncidenceMatrix } from '../types.js';

const CELL_WIDTH = 3;

function cell(value: number | string): string {
  return String(value).padStart(CELL_WIDTH);
}

/**
 * Vertex-by-edge table; columns follow `graph.edges()` order
 */
export function incidenceMatrix(graph: SocialGraph): IncidenceMatrix {
  const edges = graph.edges();
  const rows: number[][] = [];

  for (let vertex = 0; vertex < graph.size; vertex++) {
    rows.push(edges.map(([u, v]) => (vertex === u || vertex === v ? 1 : 0)));
  }

  return { edges, rows };
}

export function formatAdjacencyList(graph: SocialGraph): string {
  const lines = ['Adjacency list:'];
  for (const vertex of graph.vertices()) {
    const friends = vertex.neighborNames.length > 0 ? vertex.neighborNames.join(' -> ') : '(none)';
    lines.push(` ${vertex.index}: ${vertex.name} -> ${friends}`);
  }
  return lines.join('\n');
}

export function formatAdjacencyMatrix(graph: SocialGraph): string {
  const matrix = graph.adjacencyMatrix();
  const columns = matrix.map((_, index) => cell(index)).join('');
  const lines = [
    'Adjacency matrix:',
    `    ${columns}`,
    `   +${'-'.repeat(CELL_WIDTH * matrix.length)}`,
  ];

  matrix.forEach((row, index) => {
    const cells = row.map(present => cell(present ? 1 : 0)).join('');
    lines.push(`${String(index).padStart(2)} |${cells}   ${graph.vertexName(index)}`);
  });

  return lines.join('\n');
}

export function formatIncidenceMatrix(graph: SocialGraph): string {
  const { edges, rows } = incidenceMatrix(graph);
  const lines = [
    `Incidence matrix (${graph.size} vertices x ${edges.length} edges):`,
    `    ${edges.map((_, index) => cell(index)).join('')}`,
    `   +${'-'.repeat(CELL_WIDTH * edges.length)}`,
  ];

  rows.forEach((row, index) => {
    lines.push(`${String(index).padStart(2)} |${row.map(cell).join('')}   ${graph.vertexName(index)}`);
  });

  if (edges.length === 0) {
    lines.push('(no edges)');
  }

  return lines.join('\n');
}

export function formatAsciiView(graph: SocialGraph): string {
  return graph
    .vertices()
    .map(vertex => {
      const friends = vertex.neighborNames.length > 0 ? vertex.neighborNames.join(', ') : '(no friends)';
      return `[${vertex.index}] ${vertex.name} -- ${friends}`;
    })
    .join('\n');
}
