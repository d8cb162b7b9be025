// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE SCHEMAS — Formula and Import Template Requests
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { FormulaTemplateSchema, ImportTemplateSchema } from '../../types/templates.js';

export const CreateFormulaTemplateSchema = FormulaTemplateSchema.omit({ id: true, createdAt: true });

export const UpdateFormulaTemplateSchema = CreateFormulaTemplateSchema.partial().refine(
  (data) => Object.values(data).some((v) => v !== undefined),
  { message: 'At least one field must be provided for update' }
);

export const CreateImportTemplateSchema = ImportTemplateSchema.omit({ id: true, createdAt: true });

export type CreateFormulaTemplateInput = z.infer<typeof CreateFormulaTemplateSchema>;
export type CreateImportTemplateInput = z.infer<typeof CreateImportTemplateSchema>;
