/**
 * Network manager - owns independent social graphs, one per network id
 */
import { v4 as uuidv4 } from 'uuid';
import { SocialGraph, DEFAULT_CAPACITY } from '../graph/social-graph.js';
import type { NetworkSummary } from '../types.js';

export interface NetworkSession {
  id: string;
  name: string;
  graph: SocialGraph;
  createdAt: Date;
  lastActivity: Date;
}

export interface NetworkManagerOptions {
  defaultCapacity?: number;
  idleTimeoutMs?: number;
}

export interface CreateNetworkOptions {
  name?: string;
  capacity?: number;
}

export class NetworkManager {
  private networks: Map<string, NetworkSession> = new Map();
  private readonly defaultCapacity: number;
  private readonly idleTimeoutMs: number;

  constructor(options: NetworkManagerOptions = {}) {
    this.defaultCapacity = options.defaultCapacity ?? DEFAULT_CAPACITY;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30 * 60 * 1000; // 30 minutes
  }

  /**
   * Create a new, empty network
   */
  createNetwork(options: CreateNetworkOptions = {}): NetworkSession {
    const now = new Date();
    this.cleanup(now);

    const id = uuidv4();
    const session: NetworkSession = {
      id,
      name: options.name || `network-${id.slice(0, 8)}`,
      graph: new SocialGraph(options.capacity ?? this.defaultCapacity),
      createdAt: now,
      lastActivity: now,
    };

    this.networks.set(id, session);
    return session;
  }

  /**
   * Get a network by ID; idle networks expire on access
   */
  getNetwork(id: string): NetworkSession | null {
    const session = this.networks.get(id);

    if (!session) {
      return null;
    }

    const now = new Date();
    if (this.isExpired(session, now)) {
      this.networks.delete(id);
      return null;
    }

    session.lastActivity = now;
    return session;
  }

  listNetworks(): NetworkSummary[] {
    this.cleanup();
    return Array.from(this.networks.values()).map(summarize);
  }

  deleteNetwork(id: string): boolean {
    return this.networks.delete(id);
  }

  /**
   * Drop expired networks; returns how many were removed
   */
  cleanup(now: Date = new Date()): number {
    let cleaned = 0;

    for (const [id, session] of this.networks) {
      if (this.isExpired(session, now)) {
        this.networks.delete(id);
        cleaned++;
      }
    }

    return cleaned;
  }

  getActiveNetworkCount(): number {
    this.cleanup();
    return this.networks.size;
  }

  private isExpired(session: NetworkSession, now: Date): boolean {
    return now.getTime() - session.lastActivity.getTime() > this.idleTimeoutMs;
  }
}

export function summarize(session: NetworkSession): NetworkSummary {
  return {
    id: session.id,
    name: session.name,
    capacity: session.graph.capacity,
    vertexCount: session.graph.size,
    edgeCount: session.graph.edgeCount,
    createdAt: session.createdAt.toISOString(),
  };
}
