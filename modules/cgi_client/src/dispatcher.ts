import { configError } from './cgiErrors.js';
import type { TargetEntry } from './config/schema.js';
import { FetchHttpClient } from './fetchHttpClient.js';
import type { HttpClient } from './httpClient.js';
import type { CgiClientConfig } from './loadConfig.js';
import { LocalCgiClient, type LocalClientOptions } from './localClient.js';
import { createLogger, type Logger } from './logger.js';
import { SpawnProcessRunner, type ProcessRunner } from './processRunner.js';
import { RemoteCgiClient } from './remoteClient.js';

export type CgiClient = LocalCgiClient | RemoteCgiClient;

export interface ClientDependencies {
  runner: ProcessRunner;
  httpClient: HttpClient;
  logger: Logger;
}

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):/;

export function createDefaultClientDependencies(): ClientDependencies {
  return {
    runner: new SpawnProcessRunner(),
    httpClient: new FetchHttpClient(),
    logger: createLogger()
  };
}

/** Lower-cased URL scheme of a target, or '' for a path or command line. */
export function detectScheme(target: string): string {
  const match = SCHEME_PATTERN.exec(target.trim());
  return match ? match[1].toLowerCase() : '';
}

/**
 * Picks the backend once, from the target's scheme: none runs the target
 * locally, `http`/`https` calls it remotely, anything else is rejected.
 */
export function createCgiClient(
  target: string,
  deps: ClientDependencies,
  options: LocalClientOptions = {}
): CgiClient {
  const scheme = detectScheme(target);
  switch (scheme) {
    case '':
      return new LocalCgiClient(target, deps, options);
    case 'http':
    case 'https':
      return new RemoteCgiClient(target, deps);
    default:
      throw configError(`Invalid scheme "${scheme}" in CGI target ${target}`);
  }
}

/**
 * A registered target name, or else the argument taken as a literal target.
 * Without an argument the configured default target is used, which may
 * itself be a registered name.
 */
export function resolveTarget(
  nameOrTarget: string | undefined,
  config: Pick<CgiClientConfig, 'targets' | 'defaultTarget'>
): TargetEntry {
  const name = nameOrTarget || config.defaultTarget;
  if (!name) {
    throw configError('No CGI target given and CGI_CLIENT_TARGET is not set');
  }
  if (Object.hasOwn(config.targets, name)) {
    return config.targets[name];
  }
  return { target: name };
}

export function createClientForTarget(
  nameOrTarget: string | undefined,
  config: Pick<CgiClientConfig, 'targets' | 'defaultTarget'>,
  deps: ClientDependencies
): CgiClient {
  const entry = resolveTarget(nameOrTarget, config);
  return createCgiClient(entry.target, deps, { environment: entry.environment });
}
