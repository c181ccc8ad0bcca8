/**
 * Network definition files (YAML) and the demonstration network
 */
import { existsSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { networkDefinitionSchema, populateGraph, type NetworkDefinition } from './builder.js';
import type { SocialGraph } from './social-graph.js';
import type { PopulateResult } from '../types.js';

/**
 * Nearest directory above this module that holds a package.json
 */
function packageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (!existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      return process.cwd();
    }
    dir = parent;
  }
  return dir;
}

export const DEFAULT_SAMPLE_PATH = path.join(packageRoot(), 'data', 'sample-network.yaml');

/**
 * Parse YAML content into a validated network definition
 */
export function parseNetworkDefinition(content: string): NetworkDefinition {
  const raw: unknown = yaml.load(content);
  return networkDefinitionSchema.parse(raw);
}

export async function loadNetworkDefinition(filePath: string): Promise<NetworkDefinition> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseNetworkDefinition(content);
}

/**
 * Insert the demonstration network into an existing graph
 */
export async function loadSampleNetwork(
  graph: SocialGraph,
  samplePath: string = DEFAULT_SAMPLE_PATH
): Promise<PopulateResult> {
  const definition = await loadNetworkDefinition(samplePath);
  return populateGraph(graph, definition);
}
