// src/core/store/schemas.ts

import { z } from 'zod';

export const OAuth1TokensSchema = z.object({
  consumer_key: z.string().min(1),
  consumer_secret: z.string().min(1),
  access_token: z.string().min(1),
  access_secret: z.string().min(1),
  access_token_expiry: z.string().optional(),
});

export const DEPConfigSchema = z.object({
  baseUrl: z.string().url(),
});
