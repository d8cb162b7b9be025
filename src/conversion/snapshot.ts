// ═══════════════════════════════════════════════════════════════════════════════
// WORK-IN-PROGRESS SNAPSHOT — Serialized Session State
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { COST_TYPES, TAKEOFF_TYPES, UNIT_SYSTEMS } from '../types/records.js';
import { FieldMappingSchema } from '../types/templates.js';

export const SNAPSHOT_VERSION = 1;

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const MappedRecordSchema = z.object({
  costType: z.union([z.enum(COST_TYPES), z.literal('')]),
  name: z.string(),
  usage: z.string(),
  takeoffType: z.union([z.enum(TAKEOFF_TYPES), z.literal('')]),
  formula: z.string(),
  wastePercent: z.string(),
  roundUpTo: z.string(),
  sku: z.string(),
  description: z.string(),
  costEach: z.string(),
  markupPercent: z.string(),
  units: z.string(),
  extensions: z.record(z.string()),
});

export const WorkInProgressSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  savedAt: z.string().datetime(),
  sourceName: z.string(),
  columns: z.array(z.string()),
  rows: z.array(z.record(CellValueSchema)),
  records: z.array(MappedRecordSchema),
  fieldMapping: FieldMappingSchema,
  customMappings: z.record(z.string()),
  unitSystem: z.enum(UNIT_SYSTEMS),
}).refine(
  (snapshot) => snapshot.rows.length === snapshot.records.length,
  { message: 'rows and records must have the same length', path: ['records'] }
);

export type WorkInProgressSnapshot = z.infer<typeof WorkInProgressSnapshotSchema>;
