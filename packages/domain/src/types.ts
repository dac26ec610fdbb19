import { z } from 'zod';

// ============================================================================
// ENUMS
// ============================================================================

export const EntityKind = z.enum([
  'shade-full',    // primary + secondary + tilt
  'shade-dual',    // primary + secondary
  'shade-primary', // primary only
  'scene',
]);
export type EntityKind = z.infer<typeof EntityKind>;

export const ShadeKind = EntityKind.extract(['shade-full', 'shade-dual', 'shade-primary']);
export type ShadeKind = z.infer<typeof ShadeKind>;

export const PositionAxis = z.enum(['primary', 'secondary', 'tilt']);
export type PositionAxis = z.infer<typeof PositionAxis>;

/**
 * Battery status reported on GV6.
 * 0 unknown, 1 normal, 2 low, 3 critical.
 */
export const BatteryStatus = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);
export type BatteryStatus = z.infer<typeof BatteryStatus>;

/** Capability class 0..10, or null when the gateway reports none. */
export const CapabilityClass = z.number().int().min(0).max(10).nullable();
export type CapabilityClass = z.infer<typeof CapabilityClass>;

// ============================================================================
// POSITIONS
// ============================================================================

const AxisValue = z.number().min(0).max(100).nullable();

export const PositionsSchema = z.object({
  primary: AxisValue.optional(),
  secondary: AxisValue.optional(),
  tilt: AxisValue.optional(),
});
export type Positions = z.infer<typeof PositionsSchema>;

// ============================================================================
// DEVICE
// ============================================================================

export const DeviceRecordSchema = z.object({
  id: z.string().min(1),          // gateway device URL
  label: z.string(),
  controllableName: z.string(),
  kind: ShadeKind,
  capabilities: CapabilityClass,
  roomId: z.number().int().nonnegative(),
  batteryStatus: BatteryStatus,
  positions: PositionsSchema,
  online: z.boolean(),
  moving: z.boolean(),
  signal: z.number().int().min(0).max(5).nullable(),
});
export type DeviceRecord = z.infer<typeof DeviceRecordSchema>;

// ============================================================================
// SCENE
// ============================================================================

/**
 * Target positions for one member. pos1/pos2 are scaled by 100,
 * tilt is unscaled. vel and etaInSeconds are carried but never compared.
 */
export const ScenePositionSchema = z.object({
  pos1: z.number().optional(),
  pos2: z.number().optional(),
  tilt: z.number().optional(),
  vel: z.number().optional(),
  etaInSeconds: z.number().optional(),
});
export type ScenePosition = z.infer<typeof ScenePositionSchema>;

export const SceneMemberSchema = z.object({
  deviceId: z.string().min(1),
  pos: ScenePositionSchema,
  capabilityHint: CapabilityClass.optional(),
});
export type SceneMember = z.infer<typeof SceneMemberSchema>;

export const SceneRecordSchema = z.object({
  id: z.string().min(1),          // scenario OID
  label: z.string(),
  members: z.array(SceneMemberSchema),
});
export type SceneRecord = z.infer<typeof SceneRecordSchema>;
