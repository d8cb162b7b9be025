// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION SCHEMAS — Session, Run and Export Requests
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ProviderNameSchema, UnitSystemSchema } from '../../config/schema.js';
import { EXPORT_FORMATS } from '../../export/index.js';
import { FieldMappingSchema } from '../../types/templates.js';

export const IdSchema = z.string().trim().min(1).max(100);

export const IdParamSchema = z.object({ id: IdSchema });

/**
 * Query of the raw upload: POST /sessions?fileName=estimate.xlsx
 */
export const UploadQuerySchema = z.object({
  fileName: z.string().trim().min(1).max(255),
  unitSystem: UnitSystemSchema.optional(),
  importTemplateId: IdSchema.optional(),
});

export const UpdateSettingsSchema = z.object({
  unitSystem: UnitSystemSchema.optional(),
  fieldMapping: FieldMappingSchema.optional(),
  customMappings: z.record(z.string().trim().min(1).max(200)).optional(),
  importTemplateId: IdSchema.optional(),
}).refine(
  (data) => Object.values(data).some((v) => v !== undefined),
  { message: 'At least one setting must be provided' }
);

export const EngineTaskSchema = z.enum(['costType', 'takeoffType', 'formula']);

export const TaskParamSchema = IdParamSchema.extend({ task: EngineTaskSchema });

export const RunTaskSchema = z.object({
  mode: z.enum(['ai', 'local']).default('ai'),
  provider: ProviderNameSchema.optional(),
  model: z.string().trim().min(1).max(100).optional(),
});

export const RecordsQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const ExportQuerySchema = z.object({
  format: z.enum(EXPORT_FORMATS).default('csv'),
});

export type UploadQuery = z.infer<typeof UploadQuerySchema>;
export type UpdateSettingsInput = z.infer<typeof UpdateSettingsSchema>;
export type RunTaskInput = z.infer<typeof RunTaskSchema>;
