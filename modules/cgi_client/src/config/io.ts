import fs from 'node:fs';
import path from 'node:path';

import { configError } from '../cgiErrors.js';
import {
  type SchemaError,
  type TargetsDocument,
  type TargetsValidator,
  validateTargetsDocument
} from './schema.js';

export const TARGETS_FILENAME = 'targets.json';

export interface LoadResult<T> {
  document: T;
  path: string;
}

export function loadTargetsConfig(
  configDir: string,
  validate: TargetsValidator = validateTargetsDocument
): LoadResult<TargetsDocument> {
  const filePath = path.join(configDir, TARGETS_FILENAME);
  const fallback = { targets: {} } satisfies TargetsDocument;

  if (!fs.existsSync(filePath)) {
    return { document: fallback, path: filePath };
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  if (raw.trim().length === 0) {
    return { document: fallback, path: filePath };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw configError(`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  if (!validate(parsed)) {
    const messages = collectErrors(validate.errors);
    throw configError(`Configuration file ${filePath} is invalid:\n${messages.join('\n')}`);
  }

  return { document: parsed, path: filePath };
}

export function resolveConfigDirectory(configured?: string): string {
  if (configured) {
    return path.resolve(configured);
  }
  const candidates = [
    path.resolve(process.cwd(), 'config'),
    path.resolve(process.cwd(), 'modules/cgi_client/config')
  ];
  for (const dir of candidates) {
    if (fs.existsSync(dir)) {
      return dir;
    }
  }
  return candidates[0];
}

function collectErrors(errors: SchemaError[] | null | undefined): string[] {
  if (!errors?.length) {
    return ['Unknown validation error'];
  }
  return errors.map((err) => `${err.instancePath || '/'} ${err.message ?? ''}`.trim());
}
