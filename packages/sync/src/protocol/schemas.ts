import type { DeviceInput, PropertyValue } from '@homesync/core';
import { z } from 'zod';

/**
 * Any JSON value a device property may hold (everything but `null`).
 */
export const propertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.boolean(),
    z.number(),
    z.string(),
    z.array(propertyValueSchema),
    z.record(propertyValueSchema),
  ])
);

/**
 * Property diff as carried on the wire; `null` deletes the key.
 */
export const propertyDiffSchema = z.record(propertyValueSchema.nullable());

/**
 * One device row as the gateway reports it, in the snapshot list and in the
 * `device` field of a push update for a newly paired device.
 */
export const gatewayDeviceSchema = z
  .object({
    friendly_name: z.string().min(1),
    state: propertyDiffSchema.nullish(),
    zones: z.array(z.string()).nullish(),
    interviewing: z.boolean().optional(),
    interview_completed: z.boolean().optional(),
    disabled: z.boolean().optional(),
    supported: z.boolean().optional(),
    availability: z.enum(['online', 'offline']).optional(),
    last_seen: z.string().nullish(),
    type: z.string().nullish(),
    manufacturer: z.string().nullish(),
    model_id: z.string().nullish(),
    custom_name: z.string().nullish(),
    custom_category: z.string().nullish(),
  })
  .passthrough();

export type GatewayDevice = z.infer<typeof gatewayDeviceSchema>;

/** Snapshot body; gateways answer `null` when they know no devices. */
export const deviceListSchema = z.array(gatewayDeviceSchema).nullable();

export const deviceUpdateFrameSchema = z
  .object({
    type: z.literal('device_update'),
    device_name: z.string().min(1),
    state: propertyDiffSchema.nullish(),
    device: gatewayDeviceSchema.nullish(),
    timestamp: z.string().optional(),
  })
  .refine((frame) => frame.state != null || frame.device != null, {
    message: 'device_update needs a state or a device',
  });

export const pingFrameSchema = z.object({
  type: z.literal('ping'),
  timestamp: z.number().optional(),
});

export const pongFrameSchema = z.object({
  type: z.literal('pong'),
  timestamp: z.number().optional(),
});

export const envelopeSchema = z.object({ type: z.string().min(1) }).passthrough();

/**
 * Normalize a gateway device row into store input. `null` state values are
 * dropped since a snapshot has nothing to delete.
 */
export function toDeviceInput(row: GatewayDevice): DeviceInput {
  const properties: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(row.state ?? {})) {
    if (value !== null) properties[key] = value;
  }

  return {
    id: row.friendly_name,
    properties,
    zones: row.zones ?? [],
    status: {
      online: row.disabled !== true && row.availability !== 'offline',
      interviewing: row.interviewing ?? false,
    },
    lastSeen: row.last_seen ?? null,
    metadata: {
      type: row.type ?? undefined,
      manufacturer: row.manufacturer ?? undefined,
      modelId: row.model_id ?? undefined,
      customName: row.custom_name ?? undefined,
      customCategory: row.custom_category ?? undefined,
      supported: row.supported,
    },
  };
}
