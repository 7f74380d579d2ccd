/**
 * Zod schemas for configuration and desired-state validation
 */
import { z } from 'zod';

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// DNS record type schema
export const dnsRecordTypeSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(['A', 'AAAA', 'CNAME', 'MX', 'TXT', 'NS'])
);

// Provider type schema
export const providerTypeSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['cloudflare', 'digitalocean'])
);

// Base application config schema
export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  retryAttempts: z.coerce.number().int().min(1).max(10).default(3),
  retryBaseDelay: z.coerce.number().int().min(0).default(1000),
  retryMaxDelay: z.coerce.number().int().min(0).default(30000),
  providerType: providerTypeSchema.optional(),
});

// Provider-specific credential schemas
export const cloudflareCredentialsSchema = z.object({
  apiToken: z.string({ required_error: 'CLOUDFLARE_TOKEN is required' }).min(1, 'CLOUDFLARE_TOKEN is required'),
  zoneName: z.string({ required_error: 'zone is required (--zone, file zone or CLOUDFLARE_ZONE)' }).min(1, 'zone is required'),
  zoneId: z.string().optional(),
});

export const digitalOceanCredentialsSchema = z.object({
  apiToken: z.string({ required_error: 'DO_TOKEN is required' }).min(1, 'DO_TOKEN is required'),
  domain: z.string({ required_error: 'zone is required (--zone, file zone or DO_DOMAIN)' }).min(1, 'zone is required'),
});

/**
 * TTL: "Automatic"/"auto" (any case), or explicit seconds
 */
export const ttlSchema = z.preprocess(
  (value) => {
    if (value === undefined || value === null) return 'auto';
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (/^(auto|automatic)$/i.test(trimmed)) return 'auto';
      if (/^\d+$/.test(trimmed)) return Number(trimmed);
    }
    return value;
  },
  z.union([
    z.literal('auto'),
    z.number().int().min(1, 'TTL must be between 1 and 86400').max(86400, 'TTL must be between 1 and 86400'),
  ])
);

const recordObjectSchema = z
  .object({
    type: dnsRecordTypeSchema,
    host: z.string().default('@'),
    value: z.string({ required_error: 'value is required' }).min(1, 'value is required'),
    priority: z.number().int().min(0).max(65535).nullish(),
    ttl: ttlSchema,
  })
  .strict();

/**
 * Accepts a record object or a `[type, host, value, priority?, ttl?]` tuple
 */
export const desiredRecordSchema = z.preprocess((value) => {
  if (!Array.isArray(value)) return value;
  const [type, host, recordValue, priority, ttl] = value;
  return { type, host, value: recordValue, priority, ttl };
}, recordObjectSchema);

export const recordSelectorSchema = z.object({
  type: dnsRecordTypeSchema.optional(),
  host: z.string().min(1),
});

/**
 * Bare list of records, or `{ zone?, ignore?, records }`
 */
export const desiredStateFileSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { records: value } : value),
  z
    .object({
      zone: z.string().min(1).optional(),
      ignore: z.array(recordSelectorSchema).optional(),
      records: z.array(desiredRecordSchema),
    })
    .strict()
);

// Provider wire formats
export const cloudflareRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  content: z.string().optional(),
  ttl: z.number(),
  proxied: z.boolean().optional(),
  priority: z.number().optional(),
});

export const digitalOceanRecordSchema = z.object({
  id: z.number(),
  type: z.string(),
  name: z.string(),
  data: z.string(),
  ttl: z.number(),
  priority: z.number().nullish(),
});

// Export types inferred from schemas
export type LogLevel = z.infer<typeof logLevelSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type CloudflareCredentials = z.infer<typeof cloudflareCredentialsSchema>;
export type DigitalOceanCredentials = z.infer<typeof digitalOceanCredentialsSchema>;
export type DesiredRecordInput = z.infer<typeof desiredRecordSchema>;
export type CloudflareRecord = z.infer<typeof cloudflareRecordSchema>;
export type DigitalOceanRecord = z.infer<typeof digitalOceanRecordSchema>;
