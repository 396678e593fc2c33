// src/api/profile/types.ts

import { z } from 'zod';

/**
 * DEP enrollment profile. `profile_uuid` is only present on profiles read
 * back from DEP.
 */
export const ProfileSchema = z.object({
  profile_name: z.string(),
  url: z.string(),
  allow_pairing: z.boolean().optional(),
  is_supervised: z.boolean().optional(),
  is_multi_user: z.boolean().optional(),
  is_mandatory: z.boolean().optional(),
  await_device_configured: z.boolean().optional(),
  is_mdm_removable: z.boolean().optional(),
  support_phone_number: z.string().optional(),
  auto_advance_setup: z.boolean().optional(),
  support_email_address: z.string().optional(),
  org_magic: z.string().optional(),
  anchor_certs: z.array(z.string()).optional(),
  supervising_host_certs: z.array(z.string()).optional(),
  department: z.string().optional(),
  devices: z.array(z.string()).optional(),
  language: z.string().optional(),
  region: z.string().optional(),
  configuration_web_url: z.string().optional(),
  skip_setup_items: z.array(z.string()).optional(),
  profile_uuid: z.string().optional(),
});

export type Profile = z.infer<typeof ProfileSchema>;

export const DefineProfileResponseSchema = z.object({
  profile_uuid: z.string(),
  devices: z.union([z.array(z.string()), z.record(z.string())]).optional(),
});

export type DefineProfileResponse = z.infer<typeof DefineProfileResponseSchema>;

/** Per-serial outcome, e.g. SUCCESS, NOT_ACCESSIBLE, FAILED. */
export const DeviceStatusMapSchema = z.record(z.string());

export type DeviceStatusMap = z.infer<typeof DeviceStatusMapSchema>;

export const AssignProfileRequestSchema = z.object({
  profile_uuid: z.string(),
  devices: z.array(z.string()),
});

export type AssignProfileRequest = z.infer<typeof AssignProfileRequestSchema>;

export const AssignProfileResponseSchema = z.object({
  profile_uuid: z.string(),
  devices: DeviceStatusMapSchema,
});

export type AssignProfileResponse = z.infer<typeof AssignProfileResponseSchema>;

export const ClearProfileRequestSchema = z.object({
  devices: z.array(z.string()),
});

export type ClearProfileRequest = z.infer<typeof ClearProfileRequestSchema>;

export const ClearProfileResponseSchema = z.object({
  devices: DeviceStatusMapSchema,
});

export type ClearProfileResponse = z.infer<typeof ClearProfileResponseSchema>;
