import dotenv from 'dotenv';

import { loadTargetsConfig, resolveConfigDirectory } from './config/io.js';
import type { TargetEntry } from './config/schema.js';

export type { TargetEntry } from './config/schema.js';

export interface GatewayConfig {
  host: string;
  port: number;
}

export interface CgiClientConfig {
  defaultTarget?: string;
  gateway: GatewayConfig;
  targets: Record<string, TargetEntry>;
  configPath: string;
}

export function loadConfig(): CgiClientConfig {
  dotenv.config();

  const host = process.env.CGI_CLIENT_GATEWAY_HOST ?? '127.0.0.1';
  const port = parsePort(process.env.CGI_CLIENT_GATEWAY_PORT, 4080);
  const defaultTarget = process.env.CGI_CLIENT_TARGET || undefined;

  const { document, path } = loadTargetsConfig(resolveConfigDirectory(process.env.CGI_CLIENT_CONFIG_DIR));

  return {
    defaultTarget,
    gateway: { host, port },
    targets: document.targets,
    configPath: path
  };
}

function parsePort(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed >= 0 && parsed <= 65535 ? parsed : fallback;
}
