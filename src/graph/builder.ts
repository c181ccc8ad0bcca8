/**
 * Graph builder - populates a social graph from a declarative network definition
 */
import { z } from 'zod';
import { GraphError } from './errors.js';
import { SocialGraph, DEFAULT_CAPACITY } from './social-graph.js';
import type { PopulateResult } from '../types.js';

export const networkDefinitionSchema = z.object({
  name: z.string().min(1).optional(),
  people: z.array(z.string().min(1)),
  friendships: z.array(z.tuple([z.string().min(1), z.string().min(1)])).default([]),
});

export type NetworkDefinition = z.infer<typeof networkDefinitionSchema>;

/**
 * Add the people and friendships of a definition that the graph does not
 * already have. Everything is validated before the graph is touched.
 */
export function populateGraph(graph: SocialGraph, definition: NetworkDefinition): PopulateResult {
  const newPeople: string[] = [];
  const skippedPeople: string[] = [];

  for (const name of definition.people) {
    if (name.length === 0) {
      throw new GraphError('InvalidName', 'Name must not be empty');
    }
    if (graph.findIndex(name) !== undefined || newPeople.includes(name)) {
      skippedPeople.push(name);
    } else {
      newPeople.push(name);
    }
  }

  if (graph.size + newPeople.length > graph.capacity) {
    throw new GraphError(
      'CapacityExceeded',
      `Adding ${newPeople.length} people would exceed capacity ${graph.capacity} (currently ${graph.size})`
    );
  }

  const known = (name: string) => graph.findIndex(name) !== undefined || newPeople.includes(name);
  for (const [a, b] of definition.friendships) {
    for (const name of [a, b]) {
      if (!known(name)) {
        throw new GraphError('VertexNotFound', `Friendship references unknown person "${name}"`);
      }
    }
    if (a === b) {
      throw new GraphError('SelfLoop', `"${a}" cannot befriend themselves`);
    }
  }

  for (const name of newPeople) {
    graph.insertVertex(name);
  }

  const addedFriendships: [string, string][] = [];
  const skippedFriendships: [string, string][] = [];

  for (const [a, b] of definition.friendships) {
    const u = graph.requireIndex(a);
    const v = graph.requireIndex(b);
    if (graph.hasEdge(u, v)) {
      skippedFriendships.push([a, b]);
      continue;
    }
    graph.insertEdge(u, v);
    addedFriendships.push([a, b]);
  }

  return {
    addedPeople: newPeople,
    skippedPeople,
    addedFriendships,
    skippedFriendships,
  };
}

/**
 * Build a fresh graph from a definition
 */
export function buildGraph(definition: NetworkDefinition, capacity: number = DEFAULT_CAPACITY): SocialGraph {
  const graph = new SocialGraph(capacity);
  populateGraph(graph, definition);
  return graph;
}
