// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE & HISTORY TYPES — Persisted Auxiliary State
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { COST_TYPES, TAKEOFF_TYPES, UNIT_SYSTEMS } from './records.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIELD MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Source fields the converter reads; each names the column that feeds it.
 */
export const FieldMappingSchema = z.object({
  name: z.string().optional(),
  sku: z.string().optional(),
  costEach: z.string().optional(),
  units: z.string().optional(),
  description: z.string().optional(),
  usage: z.string().optional(),
  wastePercent: z.string().optional(),
  markupPercent: z.string().optional(),
  roundUpTo: z.string().optional(),
  supplier: z.string().optional(),
  quantity: z.string().optional(),
});

export type FieldMapping = z.infer<typeof FieldMappingSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// FORMULA TEMPLATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Saved formula, shown to the model as a worked example.
 */
export const FormulaTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(200),
  formula: z.string().min(1).max(500),
  description: z.string().max(1000).optional(),
  category: z.string().max(100).optional(),
  takeoffType: z.enum(TAKEOFF_TYPES).optional(),
  createdAt: z.string().datetime(),
});

export type FormulaTemplate = z.infer<typeof FormulaTemplateSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// IMPORT TEMPLATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Named field mapping for a recurring export layout.
 */
export const ImportTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(200),
  fieldMapping: FieldMappingSchema,
  customMappings: z.record(z.string()).default({}),
  unitSystem: z.enum(UNIT_SYSTEMS).default('metric'),
  createdAt: z.string().datetime(),
});

export type ImportTemplate = z.infer<typeof ImportTemplateSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// MAPPING HISTORY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * What an AI run assigned to an item, keyed by normalized name.
 * Serves as the labeled sample for the local fallbacks.
 */
export const MappingHistoryEntrySchema = z.object({
  name: z.string(),
  unit: z.string().default(''),
  costType: z.enum(COST_TYPES).optional(),
  takeoffType: z.enum(TAKEOFF_TYPES).optional(),
  formula: z.string().optional(),
  unitSystem: z.enum(UNIT_SYSTEMS).optional(),
  updatedAt: z.string().datetime(),
});

export type MappingHistoryEntry = z.infer<typeof MappingHistoryEntrySchema>;

/**
 * History key for an item name: trimmed, lower-cased, inner whitespace collapsed.
 */
export function historyKey(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}
