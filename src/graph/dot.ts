/**
 * Graphviz export - undirected `.dot` description of a social graph
 */
import fs from 'fs/promises';
import path from 'path';
import type { SocialGraph } from './social-graph.js';

export const DEFAULT_DOT_GRAPH_NAME = 'SocialNetwork';

const DOT_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function escapeLabel(label: string): string {
  return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Build the `.dot` text: vertices in index order, then edges by (u, v) ascending
 */
export function generateDot(graph: SocialGraph, graphName: string = DEFAULT_DOT_GRAPH_NAME): string {
  if (!DOT_IDENTIFIER.test(graphName)) {
    throw new Error(`Invalid DOT graph name: ${graphName}`);
  }

  const lines = [`graph ${graphName} {`];

  graph.vertices().forEach(vertex => {
    lines.push(`  v${vertex.index} [label="${escapeLabel(vertex.name)}"];`);
  });

  for (const [u, v] of graph.edges()) {
    lines.push(`  v${u} -- v${v};`);
  }

  lines.push('}');
  return `${lines.join('\n')}\n`;
}

/**
 * Write the `.dot` file, creating its directory when needed
 */
export async function writeDotFile(
  graph: SocialGraph,
  filePath: string,
  graphName: string = DEFAULT_DOT_GRAPH_NAME
): Promise<string> {
  const target = path.resolve(filePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, generateDot(graph, graphName), 'utf-8');
  return target;
}
