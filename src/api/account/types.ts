// src/api/account/types.ts

import { z } from 'zod';

const AccountUrlSchema = z.object({
  uri: z.string(),
  http_method: z.array(z.string()),
  limit: z
    .object({
      default: z.number(),
      maximum: z.number(),
    })
    .optional(),
});

export const AccountDetailSchema = z.object({
  server_name: z.string(),
  server_uuid: z.string(),
  admin_id: z.string().optional(),
  facilitator_id: z.string().optional(),
  org_name: z.string().optional(),
  org_email: z.string().optional(),
  org_phone: z.string().optional(),
  org_address: z.string().optional(),
  org_type: z.string().optional(),
  org_version: z.string().optional(),
  org_id: z.string().optional(),
  org_id_hash: z.string().optional(),
  urls: z.array(AccountUrlSchema).optional(),
});

export type AccountDetail = z.infer<typeof AccountDetailSchema>;
