/**
 * API routes - the social network command surface
 */
import path from 'path';
import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { isGraphError, type GraphErrorKind } from '../graph/errors.js';
import { GraphAnalyzer } from '../graph/analyzer.js';
import { loadNetworkDefinition, loadSampleNetwork } from '../graph/sample.js';
import { populateGraph } from '../graph/builder.js';
import { generateDot, writeDotFile } from '../graph/dot.js';
import {
  incidenceMatrix,
  formatAdjacencyList,
  formatAdjacencyMatrix,
  formatAsciiView,
  formatIncidenceMatrix,
} from '../graph/render.js';
import { summarize, type NetworkManager, type NetworkSession } from '../session/manager.js';
import type { SocialGraph } from '../graph/social-graph.js';
import type { AppConfig } from '../config.js';
import type { TraversalResult } from '../types.js';

export interface RouterContext {
  manager: NetworkManager;
  config: Pick<AppConfig, 'exportDir' | 'sampleNetworkPath'>;
}

// Request schemas
const createNetworkSchema = z.object({
  name: z.string().min(1).optional(),
  capacity: z.number().int().positive().max(1000).optional(),
  sample: z.boolean().optional(),
});

const personSchema = z.object({
  name: z.string().min(1),
});

const friendshipSchema = z.object({
  a: z.string().min(1),
  b: z.string().min(1),
});

const exportSchema = z.object({
  fileName: z.string().regex(/\.dot$/, 'fileName must end in .dot'),
});

const formatQuerySchema = z.object({
  format: z.enum(['json', 'text']).default('json'),
});

const traversalQuerySchema = z.object({
  limit: z.coerce.number().int().nonnegative().optional(),
});

const STATUS_BY_KIND: Record<GraphErrorKind, number> = {
  InvalidIndex: 400,
  SelfLoop: 400,
  InvalidName: 400,
  VertexNotFound: 404,
  EdgeNotFound: 404,
  DuplicateName: 409,
  EdgeExists: 409,
  CapacityExceeded: 409,
};

/**
 * Translate a failure into a response
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: 'Invalid request', details: error.errors });
    return;
  }
  if (isGraphError(error)) {
    res.status(STATUS_BY_KIND[error.kind]).json({
      error: 'Request rejected',
      kind: error.kind,
      message: error.message,
    });
    return;
  }
  console.error(`${context} error:`, error);
  res.status(500).json({
    error: `${context} failed`,
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}

interface GraphView {
  json: (graph: SocialGraph) => unknown;
  text: (graph: SocialGraph) => string;
}

const VIEWS: Record<string, GraphView> = {
  'adjacency-list': {
    json: graph => ({ vertices: graph.vertices() }),
    text: formatAdjacencyList,
  },
  matrix: {
    json: graph => ({
      names: graph.vertices().map(vertex => vertex.name),
      matrix: graph.adjacencyMatrix().map(row => row.map(present => (present ? 1 : 0))),
    }),
    text: formatAdjacencyMatrix,
  },
  incidence: {
    json: graph => incidenceMatrix(graph),
    text: formatIncidenceMatrix,
  },
  ascii: {
    json: graph => ({ lines: graph.size > 0 ? formatAsciiView(graph).split('\n') : [] }),
    text: formatAsciiView,
  },
};

/**
 * Create API router
 */
export function createRouter({ manager, config }: RouterContext): Router {
  const router = Router();

  /**
   * Resolve the :id parameter, answering 404 when the network is gone
   */
  const requireNetwork = (req: Request, res: Response): NetworkSession | null => {
    const session = manager.getNetwork(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Network not found' });
    }
    return session;
  };

  /**
   * POST /api/networks - Create a network, optionally seeded with the sample
   */
  router.post('/networks', async (req: Request, res: Response) => {
    try {
      const body = createNetworkSchema.parse(req.body ?? {});
      const definition = body.sample ? await loadNetworkDefinition(config.sampleNetworkPath) : null;
      const session = manager.createNetwork({
        name: body.name ?? definition?.name,
        capacity: body.capacity,
      });

      if (definition) {
        try {
          populateGraph(session.graph, definition);
        } catch (error) {
          manager.deleteNetwork(session.id);
          throw error;
        }
      }

      console.log(`Created network ${session.id} (${session.name})`);
      res.status(201).json({ network: summarize(session) });
    } catch (error) {
      sendError(res, error, 'Create network');
    }
  });

  /**
   * GET /api/networks - List live networks
   */
  router.get('/networks', (_req: Request, res: Response) => {
    res.json({ networks: manager.listNetworks() });
  });

  router.get('/networks/:id', (req: Request, res: Response) => {
    const session = requireNetwork(req, res);
    if (!session) return;

    res.json({ network: summarize(session), vertices: session.graph.vertices() });
  });

  router.delete('/networks/:id', (req: Request, res: Response) => {
    if (!manager.deleteNetwork(req.params.id)) {
      res.status(404).json({ error: 'Network not found' });
      return;
    }
    res.json({ success: true });
  });

  /**
   * POST /api/networks/:id/people - Insert a person
   */
  router.post('/networks/:id/people', (req: Request, res: Response) => {
    try {
      const session = requireNetwork(req, res);
      if (!session) return;

      const { name } = personSchema.parse(req.body);
      const index = session.graph.insertVertex(name);
      res.status(201).json({ index, name });
    } catch (error) {
      sendError(res, error, 'Insert person');
    }
  });

  /**
   * DELETE /api/networks/:id/people/:name - Remove a person and renumber the rest
   */
  router.delete('/networks/:id/people/:name', (req: Request, res: Response) => {
    try {
      const session = requireNetwork(req, res);
      if (!session) return;

      const removed = session.graph.removeVertexByName(req.params.name);
      res.json({ removed, vertexCount: session.graph.size });
    } catch (error) {
      sendError(res, error, 'Remove person');
    }
  });

  /**
   * POST /api/networks/:id/friendships - Insert a friendship
   */
  router.post('/networks/:id/friendships', (req: Request, res: Response) => {
    try {
      const session = requireNetwork(req, res);
      if (!session) return;

      const { a, b } = friendshipSchema.parse(req.body);
      session.graph.insertEdgeByName(a, b);
      res.status(201).json({ a, b, edgeCount: session.graph.edgeCount });
    } catch (error) {
      sendError(res, error, 'Insert friendship');
    }
  });

  router.delete('/networks/:id/friendships/:a/:b', (req: Request, res: Response) => {
    try {
      const session = requireNetwork(req, res);
      if (!session) return;

      session.graph.removeEdgeByName(req.params.a, req.params.b);
      res.json({ a: req.params.a, b: req.params.b, edgeCount: session.graph.edgeCount });
    } catch (error) {
      sendError(res, error, 'Remove friendship');
    }
  });

  /**
   * GET /api/networks/:id/(adjacency-list|matrix|incidence|ascii)
   */
  for (const [view, render] of Object.entries(VIEWS)) {
    router.get(`/networks/:id/${view}`, (req: Request, res: Response) => {
      try {
        const session = requireNetwork(req, res);
        if (!session) return;

        const { format } = formatQuerySchema.parse(req.query);
        if (format === 'text') {
          res.type('text/plain').send(render.text(session.graph));
          return;
        }
        res.json(render.json(session.graph));
      } catch (error) {
        sendError(res, error, `Render ${view}`);
      }
    });
  }

  /**
   * GET /api/networks/:id/(bfs|dfs)/:name - Visit order from a person
   */
  const traversals: Record<string, (analyzer: GraphAnalyzer, name: string) => TraversalResult> = {
    bfs: (analyzer, name) => analyzer.breadthFirstFrom(name),
    dfs: (analyzer, name) => analyzer.depthFirstFrom(name),
  };

  for (const [kind, traverse] of Object.entries(traversals)) {
    router.get(`/networks/:id/${kind}/:name`, (req: Request, res: Response) => {
      try {
        const session = requireNetwork(req, res);
        if (!session) return;

        const { limit } = traversalQuerySchema.parse(req.query);
        const analyzer = new GraphAnalyzer(session.graph);
        const result = traverse(analyzer, req.params.name);
        const shown = limit === undefined ? result.order : result.order.slice(0, limit);

        res.json({
          start: req.params.name,
          order: analyzer.namesOf(shown),
          indices: shown,
          count: result.count,
        });
      } catch (error) {
        sendError(res, error, `Traversal ${kind}`);
      }
    });
  }

  router.get('/networks/:id/components', (req: Request, res: Response) => {
    const session = requireNetwork(req, res);
    if (!session) return;

    const analyzer = new GraphAnalyzer(session.graph);
    const components = analyzer.connectedComponents().map(component => analyzer.namesOf(component));
    res.json({ components });
  });

  router.get('/networks/:id/statistics', (req: Request, res: Response) => {
    const session = requireNetwork(req, res);
    if (!session) return;

    res.json({ statistics: new GraphAnalyzer(session.graph).getStatistics() });
  });

  /**
   * POST /api/networks/:id/sample - Insert the demonstration network
   */
  router.post('/networks/:id/sample', async (req: Request, res: Response) => {
    try {
      const session = requireNetwork(req, res);
      if (!session) return;

      const result = await loadSampleNetwork(session.graph, config.sampleNetworkPath);
      res.json({ result, network: summarize(session) });
    } catch (error) {
      sendError(res, error, 'Load sample');
    }
  });

  /**
   * GET /api/networks/:id/dot - Graphviz description
   */
  router.get('/networks/:id/dot', (req: Request, res: Response) => {
    try {
      const session = requireNetwork(req, res);
      if (!session) return;

      res.type('text/vnd.graphviz').send(generateDot(session.graph));
    } catch (error) {
      sendError(res, error, 'Generate dot');
    }
  });

  /**
   * POST /api/networks/:id/export - Write the Graphviz file into the export directory
   */
  router.post('/networks/:id/export', async (req: Request, res: Response) => {
    try {
      const session = requireNetwork(req, res);
      if (!session) return;

      const { fileName } = exportSchema.parse(req.body);
      const written = await writeDotFile(session.graph, path.join(config.exportDir, path.basename(fileName)));
      console.log(`Exported network ${session.id} to ${written}`);
      res.status(201).json({ path: written });
    } catch (error) {
      sendError(res, error, 'Export dot');
    }
  });

  /**
   * Health check
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      activeNetworks: manager.getActiveNetworkCount(),
    });
  });

  return router;
}
