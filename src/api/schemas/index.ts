// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

import type { z } from 'zod';
import { ValidationError } from '../middleware/error-handler.js';

export {
  IdSchema,
  IdParamSchema,
  UploadQuerySchema,
  UpdateSettingsSchema,
  EngineTaskSchema,
  TaskParamSchema,
  RunTaskSchema,
  RecordsQuerySchema,
  ExportQuerySchema,
  type UploadQuery,
  type UpdateSettingsInput,
  type RunTaskInput,
} from './conversions.js';

export {
  CreateFormulaTemplateSchema,
  UpdateFormulaTemplateSchema,
  CreateImportTemplateSchema,
  type CreateFormulaTemplateInput,
  type CreateImportTemplateInput,
} from './templates.js';

/**
 * Parse request input or throw a ValidationError carrying the field errors.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((i) => i.message).join(', '),
      { fields: result.error.flatten().fieldErrors }
    );
  }
  return result.data;
}
