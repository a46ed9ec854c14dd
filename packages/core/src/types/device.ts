/**
 * Scalar property values reported by a device
 */
export type PropertyScalar = boolean | number | string;

/**
 * Nested property value, e.g. a `color` of `{ x: 0.3, y: 0.4 }`
 */
export interface PropertyObject {
  readonly [key: string]: PropertyValue;
}

/**
 * Any value a device property can hold
 */
export type PropertyValue = PropertyScalar | PropertyObject | readonly PropertyValue[];

/**
 * Property bag of a device (property name to value)
 */
export type PropertyBag = Readonly<Record<string, PropertyValue>>;

/**
 * Partial property map. A `null` value deletes the key; an absent key is
 * left unchanged.
 */
export type PropertyDiff = Readonly<Record<string, PropertyValue | null>>;

/**
 * Availability flags of a device
 */
export interface DeviceStatus {
  /** Device is reachable on its network */
  readonly online: boolean;
  /** Device is still being interviewed by the coordinator */
  readonly interviewing: boolean;
}

/**
 * Descriptive fields carried by the gateway snapshot
 */
export interface DeviceMetadata {
  readonly type?: string;
  readonly manufacturer?: string;
  readonly modelId?: string;
  /** User-assigned display name */
  readonly customName?: string;
  /** User-assigned category */
  readonly customCategory?: string;
  readonly supported?: boolean;
}

/**
 * A device in the local replica.
 *
 * Entities are frozen and replaced wholesale on every mutation, so a reader
 * holding a reference never sees it change underneath.
 */
export interface DeviceEntity {
  /** Stable identifier (the gateway's friendly name) */
  readonly id: string;
  readonly properties: PropertyBag;
  /** Zone memberships, unique and in gateway order */
  readonly zones: readonly string[];
  readonly status: DeviceStatus;
  /** ISO 8601 timestamp of the last message seen from the device */
  readonly lastSeen: string | null;
  readonly metadata: DeviceMetadata;
}

/**
 * Input for building a {@link DeviceEntity}; everything but the id is optional
 */
export interface DeviceInput {
  id: string;
  properties?: Record<string, PropertyValue>;
  zones?: readonly string[];
  status?: Partial<DeviceStatus>;
  lastSeen?: string | null;
  metadata?: DeviceMetadata;
}

/**
 * Partial property update for a single device
 */
export interface DevicePatch {
  deviceId: string;
  diff: PropertyDiff;
  /** Gateway timestamp of the change (ISO 8601), when known */
  timestamp?: string;
}

/**
 * Build a frozen device entity from loose input.
 */
export function createDeviceEntity(input: DeviceInput): DeviceEntity {
  return Object.freeze({
    id: input.id,
    properties: Object.freeze({ ...(input.properties ?? {}) }),
    zones: Object.freeze([...new Set(input.zones ?? [])]),
    status: Object.freeze({
      online: input.status?.online ?? true,
      interviewing: input.status?.interviewing ?? false,
    }),
    lastSeen: input.lastSeen ?? null,
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
  });
}
