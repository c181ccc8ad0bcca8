/**
 * Social graph store - people as densely indexed vertices, friendships as
 * undirected edges held both as adjacency lists and as an adjacency matrix
 */
import { GraphError } from './errors.js';
import type { EdgePair, VertexListing } from '../types.js';

export const DEFAULT_CAPACITY = 20;

interface VertexSlot {
  name: string;
  /** Neighbour indices, newest friendship first */
  adjacency: number[];
}

export class SocialGraph {
  readonly capacity: number;
  private vertexTable: VertexSlot[] = [];
  private matrix: boolean[][];

  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.matrix = SocialGraph.emptyMatrix(capacity);
  }

  private static emptyMatrix(size: number): boolean[][] {
    return Array.from({ length: size }, () => new Array<boolean>(size).fill(false));
  }

  /**
   * Number of people currently in the graph
   */
  get size(): number {
    return this.vertexTable.length;
  }

  get edgeCount(): number {
    let total = 0;
    for (const vertex of this.vertexTable) {
      total += vertex.adjacency.length;
    }
    return total / 2;
  }

  isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.vertexTable.length;
  }

  private assertIndex(index: number): void {
    if (!this.isValidIndex(index)) {
      throw new GraphError('InvalidIndex', `Index ${index} is outside [0, ${this.size})`);
    }
  }

  /**
   * Index of the person with exactly this name (case-sensitive)
   */
  findIndex(name: string): number | undefined {
    const index = this.vertexTable.findIndex(vertex => vertex.name === name);
    return index === -1 ? undefined : index;
  }

  requireIndex(name: string): number {
    const index = this.findIndex(name);
    if (index === undefined) {
      throw new GraphError('VertexNotFound', `No person named "${name}"`);
    }
    return index;
  }

  vertexName(index: number): string {
    this.assertIndex(index);
    return this.vertexTable[index].name;
  }

  /**
   * Neighbour indices of a vertex, most recently added friendship first
   */
  neighbors(index: number): number[] {
    this.assertIndex(index);
    return [...this.vertexTable[index].adjacency];
  }

  degree(index: number): number {
    this.assertIndex(index);
    return this.vertexTable[index].adjacency.length;
  }

  hasEdge(u: number, v: number): boolean {
    this.assertIndex(u);
    this.assertIndex(v);
    return this.matrix[u][v];
  }

  /**
   * Append a person at index `size`; returns the new index
   */
  insertVertex(name: string): number {
    if (name.length === 0) {
      throw new GraphError('InvalidName', 'Name must not be empty');
    }
    if (this.vertexTable.length >= this.capacity) {
      throw new GraphError('CapacityExceeded', `Graph is full (${this.capacity} people)`);
    }
    if (this.findIndex(name) !== undefined) {
      throw new GraphError('DuplicateName', `A person named "${name}" already exists`);
    }

    this.vertexTable.push({ name, adjacency: [] });
    return this.vertexTable.length - 1;
  }

  insertEdge(u: number, v: number): void {
    this.assertIndex(u);
    this.assertIndex(v);
    if (u === v) {
      throw new GraphError('SelfLoop', `A person cannot befriend themselves (index ${u})`);
    }
    if (this.matrix[u][v]) {
      throw new GraphError('EdgeExists', `Friendship ${u} -- ${v} already exists`);
    }

    this.vertexTable[u].adjacency.unshift(v);
    this.vertexTable[v].adjacency.unshift(u);
    this.matrix[u][v] = true;
    this.matrix[v][u] = true;
  }

  insertEdgeByName(a: string, b: string): void {
    this.insertEdge(this.requireIndex(a), this.requireIndex(b));
  }

  removeEdge(u: number, v: number): void {
    this.assertIndex(u);
    this.assertIndex(v);
    if (!this.matrix[u][v]) {
      throw new GraphError('EdgeNotFound', `No friendship between ${u} and ${v}`);
    }

    SocialGraph.removeFirst(this.vertexTable[u].adjacency, v);
    SocialGraph.removeFirst(this.vertexTable[v].adjacency, u);
    this.matrix[u][v] = false;
    this.matrix[v][u] = false;
  }

  removeEdgeByName(a: string, b: string): void {
    this.removeEdge(this.requireIndex(a), this.requireIndex(b));
  }

  private static removeFirst(list: number[], target: number): void {
    const position = list.indexOf(target);
    if (position !== -1) {
      list.splice(position, 1);
    }
  }

  /**
   * Remove a person and compact the table: every vertex above `target`
   * moves down one slot, and every stored neighbour index follows it.
   * Returns the removed name.
   */
  removeVertex(target: number): string {
    this.assertIndex(target);

    // Drop the vertex from everyone else's list
    for (let i = 0; i < this.vertexTable.length; i++) {
      if (i === target) continue;
      const slot = this.vertexTable[i];
      slot.adjacency = slot.adjacency.filter(neighbor => neighbor !== target);
    }

    // Release the slot and shift the table down
    const [removed] = this.vertexTable.splice(target, 1);

    // Shift matrix rows up and columns left, keeping it capacity x capacity
    this.matrix.splice(target, 1);
    this.matrix.push(new Array<boolean>(this.capacity).fill(false));
    for (const row of this.matrix) {
      row.splice(target, 1);
      row.push(false);
    }

    // Renumber surviving references
    for (const slot of this.vertexTable) {
      slot.adjacency = slot.adjacency.map(neighbor => (neighbor > target ? neighbor - 1 : neighbor));
    }

    return removed.name;
  }

  removeVertexByName(name: string): string {
    return this.removeVertex(this.requireIndex(name));
  }

  /**
   * Every person in index order with their neighbour list
   */
  vertices(): VertexListing[] {
    return this.vertexTable.map((vertex, index) => ({
      index,
      name: vertex.name,
      neighbors: [...vertex.adjacency],
      neighborNames: vertex.adjacency.map(neighbor => this.vertexTable[neighbor].name),
    }));
  }

  /**
   * Copy of the live n x n corner of the adjacency matrix
   */
  adjacencyMatrix(): boolean[][] {
    const n = this.vertexTable.length;
    return this.matrix.slice(0, n).map(row => row.slice(0, n));
  }

  /**
   * Every friendship once, as `[u, v]` with `u < v`, ordered by u then v
   */
  edges(): EdgePair[] {
    const pairs: EdgePair[] = [];
    const n = this.vertexTable.length;
    for (let u = 0; u < n; u++) {
      for (let v = u + 1; v < n; v++) {
        if (this.matrix[u][v]) {
          pairs.push([u, v]);
        }
      }
    }
    return pairs;
  }

  clear(): void {
    this.vertexTable = [];
    this.matrix = SocialGraph.emptyMatrix(this.capacity);
  }
}
