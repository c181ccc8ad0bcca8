/**
 * Common types for the social network graph
 */

/**
 * An undirected friendship as a pair of vertex indices, always `u < v`
 */
export type EdgePair = [u: number, v: number];

export interface VertexListing {
  index: number;
  name: string;
  /** Neighbour indices, most recently added friendship first */
  neighbors: number[];
  neighborNames: string[];
}

export interface TraversalResult {
  start: number;
  order: number[];
  count: number;
}

export interface IncidenceMatrix {
  edges: EdgePair[];
  /** One row per vertex, one column per edge (1 when the vertex bounds the edge) */
  rows: number[][];
}

export interface ConnectionCount {
  index: number;
  name: string;
  degree: number;
}

export interface GraphStatistics {
  totalVertices: number;
  totalEdges: number;
  capacity: number;
  density: number;
  isolated: string[];
  mostConnected: ConnectionCount[];
}

export interface NetworkSummary {
  id: string;
  name: string;
  capacity: number;
  vertexCount: number;
  edgeCount: number;
  createdAt: string;
}

export interface PopulateResult {
  addedPeople: string[];
  skippedPeople: string[];
  addedFriendships: [string, string][];
  skippedFriendships: [string, string][];
}
