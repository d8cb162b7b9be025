// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA TESTS — Request Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../middleware/error-handler.js';
import {
  CreateFormulaTemplateSchema,
  CreateImportTemplateSchema,
  ExportQuerySchema,
  RecordsQuerySchema,
  RunTaskSchema,
  TaskParamSchema,
  UpdateFormulaTemplateSchema,
  UpdateSettingsSchema,
  UploadQuerySchema,
  parseInput,
} from '../schemas/index.js';

describe('UploadQuerySchema', () => {
  it('should trim the file name', () => {
    const result = UploadQuerySchema.parse({ fileName: '  estimate.xlsx ' });
    expect(result).toEqual({ fileName: 'estimate.xlsx' });
  });

  it('should require a file name', () => {
    expect(UploadQuerySchema.safeParse({}).success).toBe(false);
    expect(UploadQuerySchema.safeParse({ fileName: '   ' }).success).toBe(false);
  });

  it('should reject an unknown unit system', () => {
    expect(UploadQuerySchema.safeParse({ fileName: 'a.csv', unitSystem: 'nautical' }).success).toBe(false);
  });
});

describe('UpdateSettingsSchema', () => {
  it('should accept a single setting', () => {
    expect(UpdateSettingsSchema.parse({ unitSystem: 'imperial' })).toEqual({ unitSystem: 'imperial' });
  });

  it('should reject an empty update', () => {
    const result = UpdateSettingsSchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('At least one setting must be provided');
    }
  });

  it('should reject blank custom mapping sources', () => {
    expect(UpdateSettingsSchema.safeParse({ customMappings: { Trade: ' ' } }).success).toBe(false);
  });
});

describe('engine run schemas', () => {
  it('should default to AI mode', () => {
    expect(RunTaskSchema.parse({})).toEqual({ mode: 'ai' });
  });

  it('should accept each engine task', () => {
    for (const task of ['costType', 'takeoffType', 'formula']) {
      expect(TaskParamSchema.safeParse({ id: 'sess_1', task }).success).toBe(true);
    }
    expect(TaskParamSchema.safeParse({ id: 'sess_1', task: 'units' }).success).toBe(false);
  });

  it('should reject an unknown provider', () => {
    expect(RunTaskSchema.safeParse({ provider: 'cohere' }).success).toBe(false);
  });
});

describe('query schemas', () => {
  it('should coerce paging parameters', () => {
    expect(RecordsQuerySchema.parse({ offset: '5', limit: '20' })).toEqual({ offset: 5, limit: 20 });
    expect(RecordsQuerySchema.parse({})).toEqual({ offset: 0, limit: 100 });
  });

  it('should cap the page size', () => {
    expect(RecordsQuerySchema.safeParse({ limit: '5000' }).success).toBe(false);
  });

  it('should default the export format to csv', () => {
    expect(ExportQuerySchema.parse({})).toEqual({ format: 'csv' });
    expect(ExportQuerySchema.safeParse({ format: 'pdf' }).success).toBe(false);
  });
});

describe('template schemas', () => {
  it('should accept a formula template without id or timestamp', () => {
    const input = { name: 'Wall area', formula: '[Length_m] * [Height_m]', takeoffType: 'Area' };
    expect(CreateFormulaTemplateSchema.parse(input)).toEqual(input);
  });

  it('should reject an empty formula template update', () => {
    expect(UpdateFormulaTemplateSchema.safeParse({}).success).toBe(false);
  });

  it('should default import template settings', () => {
    const result = CreateImportTemplateSchema.parse({ name: 'Supplier sheet', fieldMapping: { name: 'Item' } });
    expect(result).toEqual({
      name: 'Supplier sheet',
      fieldMapping: { name: 'Item' },
      customMappings: {},
      unitSystem: 'metric',
    });
  });
});

describe('parseInput', () => {
  it('should return parsed data', () => {
    expect(parseInput(ExportQuerySchema, { format: 'xlsx' })).toEqual({ format: 'xlsx' });
  });

  it('should throw ValidationError with field errors', () => {
    expect.assertions(3);
    try {
      parseInput(UploadQuerySchema, { fileName: '' });
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.statusCode).toBe(400);
        expect(error.details).toHaveProperty('fields.fileName');
      }
    }
  });
});
