/**
 * Graph analyzer - traversals and statistics over a social graph
 */
import type { SocialGraph } from './social-graph.js';
import type { ConnectionCount, GraphStatistics, TraversalResult } from '../types.js';

export class GraphAnalyzer {
  private graph: SocialGraph;

  constructor(graph: SocialGraph) {
    this.graph = graph;
  }

  /**
   * Breadth-first traversal from `start`. Vertices are marked when enqueued,
   * so none is queued twice. An out-of-range start yields an empty result.
   */
  breadthFirst(start: number): TraversalResult {
    if (!this.graph.isValidIndex(start)) {
      return { start, order: [], count: 0 };
    }

    const visited = new Array<boolean>(this.graph.size).fill(false);
    const queue: number[] = [start];
    const order: number[] = [];
    visited[start] = true;

    let head = 0;
    while (head < queue.length) {
      const current = queue[head++];
      order.push(current);

      for (const neighbor of this.graph.neighbors(current)) {
        if (!visited[neighbor]) {
          visited[neighbor] = true;
          queue.push(neighbor);
        }
      }
    }

    return { start, order, count: order.length };
  }

  /**
   * Depth-first traversal from `start`, in the same order a recursive walk
   * over the adjacency lists would produce
   */
  depthFirst(start: number): TraversalResult {
    if (!this.graph.isValidIndex(start)) {
      return { start, order: [], count: 0 };
    }

    const visited = new Array<boolean>(this.graph.size).fill(false);
    const order: number[] = [];
    const stack: Array<{ vertex: number; neighbors: number[]; next: number }> = [];

    const enter = (vertex: number): void => {
      visited[vertex] = true;
      order.push(vertex);
      stack.push({ vertex, neighbors: this.graph.neighbors(vertex), next: 0 });
    };

    enter(start);
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.neighbors.length) {
        stack.pop();
        continue;
      }
      const neighbor = frame.neighbors[frame.next++];
      if (!visited[neighbor]) {
        enter(neighbor);
      }
    }

    return { start, order, count: order.length };
  }

  breadthFirstFrom(name: string): TraversalResult {
    return this.breadthFirst(this.graph.requireIndex(name));
  }

  depthFirstFrom(name: string): TraversalResult {
    return this.depthFirst(this.graph.requireIndex(name));
  }

  /**
   * Connected components, each sorted ascending, ordered by their smallest index
   */
  connectedComponents(): number[][] {
    const seen = new Set<number>();
    const components: number[][] = [];

    for (let index = 0; index < this.graph.size; index++) {
      if (seen.has(index)) continue;
      const { order } = this.breadthFirst(index);
      order.forEach(vertex => seen.add(vertex));
      components.push([...order].sort((a, b) => a - b));
    }

    return components;
  }

  /**
   * Get statistics about the graph
   */
  getStatistics(): GraphStatistics {
    const totalVertices = this.graph.size;
    const totalEdges = this.graph.edgeCount;
    const possibleEdges = (totalVertices * (totalVertices - 1)) / 2;

    const connections: ConnectionCount[] = this.graph.vertices().map(vertex => ({
      index: vertex.index,
      name: vertex.name,
      degree: vertex.neighbors.length,
    }));

    const mostConnected = connections
      .filter(entry => entry.degree > 0)
      .sort((a, b) => b.degree - a.degree || a.index - b.index)
      .slice(0, 5);

    return {
      totalVertices,
      totalEdges,
      capacity: this.graph.capacity,
      density: possibleEdges > 0 ? totalEdges / possibleEdges : 0,
      isolated: connections.filter(entry => entry.degree === 0).map(entry => entry.name),
      mostConnected,
    };
  }

  /**
   * Resolve visited indices to names
   */
  namesOf(order: number[]): string[] {
    return order.map(index => this.graph.vertexName(index));
  }
}
