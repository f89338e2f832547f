import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@newscheck/shared/src/utils/errors.js';
import { validateSettings, validateTrustCatalog } from './validators.js';
import type { Settings } from './settings.schema.js';
import type { TrustCatalogData } from './trust-catalog.schema.js';

export const DEFAULT_TRUST_CATALOG_PATH = fileURLToPath(
  new URL('../catalog/trust-catalog.json', import.meta.url),
);

export interface AppConfig {
  readonly settings: Settings;
  readonly trustCatalog: TrustCatalogData;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return validateSettings(env);
}

export async function loadTrustCatalog(
  filePath: string = DEFAULT_TRUST_CATALOG_PATH,
): Promise<TrustCatalogData> {
  const raw = await readJsonFile(filePath);
  return validateTrustCatalog(raw);
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const settings = loadSettings(env);
  const trustCatalog = await loadTrustCatalog(settings.trustCatalogPath);
  return { settings, trustCatalog };
}
