// src/config/ConfigValidator.ts

import { z } from 'zod';

// Credential Store Configuration Schema
const CredentialStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Store backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
    encryption: z
      .object({
        key: z
          .string()
          .regex(
            /^[0-9a-f]{64}$/i,
            'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)'
          ),
        previousKeys: z.array(z.string().regex(/^[0-9a-f]{64}$/i)).optional(),
        algorithm: z.literal('aes-256-gcm'),
      })
      .optional(),
  })
  .refine((data) => data.backend === 'memory' || Boolean(data.url), {
    message: "Redis and Postgres backends require 'url' configuration",
  });

const HttpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'DELETE', 'PATCH']);

const RouteOverrideSchema = z.object({
  method: HttpMethodSchema.optional(),
  path: z.string().startsWith('/').optional(),
});

const HttpConfigSchema = z.object({
  timeout: z.number().int().positive().optional(),
  userAgent: z.string().min(1).optional(),
  concurrencyPerName: z.number().int().positive().optional(),
});

const AuthFailureMarkerSchema = z.object({
  status: z.number().int().min(400).max(499),
  bodyContains: z.string().min(1).optional(),
});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Client Configuration Schema
export const ClientConfigSchema = z.object({
  store: CredentialStoreConfigSchema.default({ backend: 'memory' }),
  http: HttpConfigSchema.default({}),
  defaultBaseUrl: z.string().url().optional(),
  authFailureMarkers: z.array(AuthFailureMarkerSchema).min(1).optional(),
  operations: z
    .object({
      account: RouteOverrideSchema,
      defineProfile: RouteOverrideSchema,
      getProfile: RouteOverrideSchema,
      assignProfile: RouteOverrideSchema,
      removeProfile: RouteOverrideSchema,
      fetchDevices: RouteOverrideSchema,
      syncDevices: RouteOverrideSchema,
      deviceDetails: RouteOverrideSchema,
      disownDevices: RouteOverrideSchema,
    })
    .partial()
    .strict()
    .optional(),
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type ClientConfig = z.input<typeof ClientConfigSchema>;
export type ResolvedClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Validate client configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ResolvedClientConfig {
  return ClientConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @param config - Configuration object to validate
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ResolvedClientConfig } | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
