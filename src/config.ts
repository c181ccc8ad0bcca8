/**
 * Service configuration read from the environment
 */
import { z } from 'zod';
import { DEFAULT_CAPACITY } from './graph/social-graph.js';
import { DEFAULT_SAMPLE_PATH } from './graph/sample.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  MAX_VERTICES: z.coerce.number().int().positive().max(1000).default(DEFAULT_CAPACITY),
  EXPORT_DIR: z.string().min(1).default('./data/exports'),
  SAMPLE_NETWORK_PATH: z.string().min(1).default(DEFAULT_SAMPLE_PATH),
  NETWORK_IDLE_TIMEOUT_MINUTES: z.coerce.number().positive().default(30),
});

export interface AppConfig {
  port: number;
  maxVertices: number;
  exportDir: string;
  sampleNetworkPath: string;
  idleTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    maxVertices: parsed.MAX_VERTICES,
    exportDir: parsed.EXPORT_DIR,
    sampleNetworkPath: parsed.SAMPLE_NETWORK_PATH,
    idleTimeoutMs: parsed.NETWORK_IDLE_TIMEOUT_MINUTES * 60 * 1000,
  };
}
