import { z } from 'zod';

// Remote source wire schemas

const paginationSchema = z.object({
  page: z.number().int().min(0).default(1),
  per_page: z.number().int().min(0).default(0),
  total_pages: z.number().int().min(0).default(1),
  total_records: z.number().int().min(0).default(0),
});

export const pageEnvelopeSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  metadata: z.record(z.unknown()).default({}),
  pagination: paginationSchema.default({}),
  data: z.array(z.record(z.unknown())).default([]),
});

export const healthPayloadSchema = z.object({
  status: z.string().default('unknown'),
  ready: z.boolean().default(false),
  // Required: a body without monitors is not a readiness payload
  // Monitors report truthy/falsy flags, not always strict booleans
  monitors: z
    .record(z.unknown())
    .transform((monitors) =>
      Object.fromEntries(Object.entries(monitors).map(([name, value]) => [name, Boolean(value)]))
    ),
  timestamp: z.string().optional(),
});

export const apiInfoSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  endpoints: z.record(z.string()).default({}),
});

// Persisted dataset file

const fetchFailureSchema = z.object({
  kind: z.enum(['transport', 'http', 'api']),
  message: z.string(),
  page: z.number().int(),
  status: z.number().int().optional(),
});

const storedMetadataSchema = z.object({
  source_endpoint: z.string().optional(),
  request_params: z.record(z.string()).optional(),
  scrape_timestamp: z.string().optional(),
  total_records: z.number().int().min(0).optional(),
  total_pages_scraped: z.number().int().min(0).optional(),
  total_pages: z.number().int().min(0).optional(),
  reported_total_records: z.number().int().min(0).optional(),
  reported_total_pages: z.number().int().min(0).optional(),
  market_type: z.string().nullish(),
  source_url: z.string().optional(),
});

export const datasetFileSchema = z.object({
  metadata: storedMetadataSchema.default({}),
  total_records: z.number().int().min(0).optional(),
  fetched_at: z.string().optional(),
  source: z.string().optional(),
  params: z.record(z.union([z.string(), z.number()])).default({}),
  fetch_error: fetchFailureSchema.optional(),
  interrupted: z.boolean().optional(),
  data: z.array(z.record(z.unknown())),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// Type helpers
export type ApiInfo = z.infer<typeof apiInfoSchema>;
export type StoredMetadata = z.infer<typeof storedMetadataSchema>;
