import type { ZodError } from 'zod';
import { SchemaValidationError } from '@newscheck/shared/src/utils/errors.js';
import { SettingsSchema } from './settings.schema.js';
import type { Settings } from './settings.schema.js';
import { NewsBatchResultSchema } from './news-result.schema.js';
import type { StoredNewsBatch } from './news-result.schema.js';
import { TrustCatalogSchema } from './trust-catalog.schema.js';
import type { TrustCatalogData } from './trust-catalog.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateSettings(data: unknown): Settings {
  const result = SettingsSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid settings', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateTrustCatalog(data: unknown): TrustCatalogData {
  const result = TrustCatalogSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid trust catalog', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateNewsBatch(data: unknown): StoredNewsBatch {
  const result = NewsBatchResultSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid news batch result', formatZodErrors(result.error));
  }

  return result.data;
}
