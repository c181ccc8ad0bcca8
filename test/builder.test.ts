/**
 * Network definition and sample loading tests
 */
import path from 'path';
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildGraph, populateGraph } from '../src/graph/builder.js';
import {
  DEFAULT_SAMPLE_PATH,
  loadSampleNetwork,
  parseNetworkDefinition,
  loadNetworkDefinition,
} from '../src/graph/sample.js';
import { SocialGraph } from '../src/graph/social-graph.js';
import { GraphError } from '../src/graph/errors.js';
import { createGraph, expectConsistent, edgeNames, SAMPLE_PATH, SAMPLE_PEOPLE, SAMPLE_FRIENDSHIPS } from './helpers.js';

describe('populateGraph', () => {
  it('should build a graph from a definition', () => {
    const graph = buildGraph({ people: ['A', 'B', 'C'], friendships: [['A', 'B'], ['C', 'A']] });

    expect(graph.size).toBe(3);
    expect(edgeNames(graph)).toEqual(['A-B', 'A-C']);
    expect(graph.neighbors(0)).toEqual([2, 1]);
    expectConsistent(graph);
  });

  it('should skip people and friendships that already exist', () => {
    const graph = createGraph(['A', 'B'], [['A', 'B']]);

    const result = populateGraph(graph, {
      people: ['B', 'C', 'C'],
      friendships: [['B', 'A'], ['B', 'C']],
    });

    expect(result).toEqual({
      addedPeople: ['C'],
      skippedPeople: ['B', 'C'],
      addedFriendships: [['B', 'C']],
      skippedFriendships: [['B', 'A']],
    });
    expect(edgeNames(graph)).toEqual(['A-B', 'B-C']);
  });

  it('should leave the graph untouched when capacity would be exceeded', () => {
    const graph = new SocialGraph(3);
    graph.insertVertex('A');

    expect(() =>
      populateGraph(graph, { people: ['B', 'C', 'D'], friendships: [] })
    ).toThrow(GraphError);
    expect(graph.size).toBe(1);
  });

  it('should reject unknown endpoints before inserting anyone', () => {
    const graph = new SocialGraph();

    let kind: string | undefined;
    try {
      populateGraph(graph, { people: ['A'], friendships: [['A', 'Ghost']] });
    } catch (error) {
      kind = error instanceof GraphError ? error.kind : undefined;
    }

    expect(kind).toBe('VertexNotFound');
    expect(graph.size).toBe(0);
  });

  it('should reject self friendships', () => {
    expect(() => buildGraph({ people: ['A'], friendships: [['A', 'A']] })).toThrow('"A" cannot befriend themselves');
  });

  it('should reject an empty name before inserting anyone', () => {
    const graph = new SocialGraph();

    let kind: string | undefined;
    try {
      populateGraph(graph, { people: ['A', 'B', ''], friendships: [] });
    } catch (error) {
      kind = error instanceof GraphError ? error.kind : undefined;
    }

    expect(kind).toBe('InvalidName');
    expect(graph.size).toBe(0);
  });

  it('should leave the graph untouched when a later friendship is a self-loop', () => {
    const graph = createGraph(['A']);

    expect(() =>
      populateGraph(graph, { people: ['B', 'C'], friendships: [['A', 'B'], ['C', 'C']] })
    ).toThrow(GraphError);
    expect(graph.size).toBe(1);
    expect(graph.edgeCount).toBe(0);
  });
});

describe('parseNetworkDefinition', () => {
  it('should parse YAML definitions', () => {
    const definition = parseNetworkDefinition(`
name: Club
people: [Ann, Ben]
friendships:
  - [Ann, Ben]
`);

    expect(definition).toEqual({ name: 'Club', people: ['Ann', 'Ben'], friendships: [['Ann', 'Ben']] });
  });

  it('should default friendships to an empty list', () => {
    expect(parseNetworkDefinition('people: [Ann]').friendships).toEqual([]);
  });

  it('should reject malformed definitions', () => {
    expect(() => parseNetworkDefinition('people: Ann')).toThrow(z.ZodError);
    expect(() => parseNetworkDefinition('people: [Ann]\nfriendships: [[Ann]]')).toThrow(z.ZodError);
  });
});

describe('sample network', () => {
  it('should match the demonstration file', async () => {
    const definition = await loadNetworkDefinition(SAMPLE_PATH);

    expect(definition.people).toEqual(SAMPLE_PEOPLE);
    expect(definition.friendships).toEqual(SAMPLE_FRIENDSHIPS);
  });

  it('should load six people and seven friendships', async () => {
    const graph = new SocialGraph();

    const result = await loadSampleNetwork(graph, SAMPLE_PATH);

    expect(result.addedPeople).toHaveLength(6);
    expect(result.addedFriendships).toHaveLength(7);
    expect(graph.size).toBe(6);
    expect(graph.edgeCount).toBe(7);
    expect(graph.vertices()[0].neighborNames).toEqual(['Carol', 'Bob']);
  });

  it('should locate the sample from the package root by default', async () => {
    const graph = new SocialGraph();

    const result = await loadSampleNetwork(graph);

    expect(path.isAbsolute(DEFAULT_SAMPLE_PATH)).toBe(true);
    expect(DEFAULT_SAMPLE_PATH).toBe(path.resolve(SAMPLE_PATH));
    expect(result.addedPeople).toEqual(SAMPLE_PEOPLE);
  });

  it('should be idempotent', async () => {
    const graph = new SocialGraph();
    await loadSampleNetwork(graph, SAMPLE_PATH);

    const second = await loadSampleNetwork(graph, SAMPLE_PATH);

    expect(second.addedPeople).toEqual([]);
    expect(second.skippedFriendships).toHaveLength(7);
    expect(graph.size).toBe(6);
  });
});
