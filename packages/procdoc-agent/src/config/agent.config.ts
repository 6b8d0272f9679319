import { ConfigType, registerAs } from '@nestjs/config';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODEL,
} from '../anthropic/anthropic.constants';

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export const agentConfig = registerAs('agent', () => ({
  model: process.env.PROCDOC_MODEL || DEFAULT_MODEL,
  maxTokens: readInt('PROCDOC_MAX_TOKENS', DEFAULT_MAX_TOKENS),
  maxSteps: readInt('PROCDOC_MAX_STEPS', 200),
  display: {
    width: readInt('PROCDOC_DISPLAY_WIDTH', 1280),
    height: readInt('PROCDOC_DISPLAY_HEIGHT', 800),
  },
  // Screenshots are only written to disk when a directory is configured
  screenshotDir: process.env.PROCDOC_SCREENSHOT_DIR || null,
  recentScreenshots: readInt('PROCDOC_RECENT_SCREENSHOTS', 3),
  actionSettleMs: readInt('PROCDOC_ACTION_SETTLE_MS', 200),
  typingDelayMs: readInt('PROCDOC_TYPING_DELAY_MS', 10),
  graph: {
    uri: process.env.NEO4J_URI || 'bolt://localhost:7687',
    user: process.env.NEO4J_USER || 'neo4j',
    database: process.env.NEO4J_DATABASE || null,
    connectionTimeoutMs: readInt('PROCDOC_GRAPH_CONNECT_TIMEOUT_MS', 5000),
    queryTimeoutMs: readInt('PROCDOC_GRAPH_QUERY_TIMEOUT_MS', 10000),
  },
  logging: {
    directory: process.env.PROCDOC_LOG_DIR || 'logs',
    level: process.env.PROCDOC_LOG_LEVEL || 'info',
  },
}));

export type AgentConfig = ConfigType<typeof agentConfig>;
export type DisplaySize = AgentConfig['display'];
export type LoggingOptions = AgentConfig['logging'];
