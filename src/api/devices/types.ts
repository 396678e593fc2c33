// src/api/devices/types.ts

import { z } from 'zod';

export const DeviceSchema = z.object({
  serial_number: z.string(),
  model: z.string().optional(),
  description: z.string().optional(),
  color: z.string().optional(),
  asset_tag: z.string().optional(),
  profile_status: z.string().optional(),
  profile_uuid: z.string().optional(),
  profile_assign_time: z.string().optional(),
  profile_push_time: z.string().optional(),
  device_assigned_date: z.string().optional(),
  device_assigned_by: z.string().optional(),
  os: z.string().optional(),
  device_family: z.string().optional(),
  // only present in sync responses
  op_type: z.string().optional(),
  op_date: z.string().optional(),
});

export type Device = z.infer<typeof DeviceSchema>;

export const DeviceRequestSchema = z.object({
  cursor: z.string().optional(),
  limit: z.number().int().positive().optional(),
});

export type DeviceRequest = z.infer<typeof DeviceRequestSchema>;

export const DeviceResponseSchema = z.object({
  devices: z.array(DeviceSchema).optional(),
  cursor: z.string().optional(),
  fetched_until: z.string().optional(),
  more_to_follow: z.boolean().optional(),
});

export type DeviceResponse = z.infer<typeof DeviceResponseSchema>;

export const DeviceListRequestSchema = z.object({
  devices: z.array(z.string()),
});

export type DeviceListRequest = z.infer<typeof DeviceListRequestSchema>;

export const DeviceDetailsResponseSchema = z.object({
  devices: z.record(DeviceSchema),
});

export type DeviceDetailsResponse = z.infer<typeof DeviceDetailsResponseSchema>;

export const DisownDevicesResponseSchema = z.object({
  devices: z.record(z.string()),
});

export type DisownDevicesResponse = z.infer<typeof DisownDevicesResponseSchema>;
