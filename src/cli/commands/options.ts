/**
 * Option parsing shared by commands
 */
import { ValidationError } from '../../core/errors.js';
import { providerTypeSchema } from '../../config/schema.js';
import type { ProviderType } from '../../types/index.js';

export function parseProviderOption(value: string | undefined): ProviderType | undefined {
  if (value === undefined) return undefined;
  const parsed = providerTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Unsupported provider: ${value} (expected cloudflare or digitalocean)`);
  }
  return parsed.data;
}
