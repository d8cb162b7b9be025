import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConversionSession } from '../../conversion/session.js';
import { FileDocumentStore } from '../file.js';
import { MemoryDocumentStore } from '../memory.js';
import { StateStore } from '../state.js';
import { StorageError } from '../types.js';

const NOW = new Date('2026-04-10T12:00:00.000Z');

describe('FileDocumentStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'converter-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return null for a missing document', async () => {
    expect(await new FileDocumentStore(dir).read('mappingHistory')).toBeNull();
  });

  it('should write documents under their file names', async () => {
    const store = new FileDocumentStore(join(dir, 'nested'));

    await store.write('formulaTemplates', '[]\n');

    expect(await readFile(join(dir, 'nested', 'formula-templates.json'), 'utf8')).toBe('[]\n');
    expect(await store.read('formulaTemplates')).toBe('[]\n');
  });

  it('should report whether a delete removed anything', async () => {
    const store = new FileDocumentStore(dir);
    await store.write('workInProgress', '{}');

    expect(await store.delete('workInProgress')).toBe(true);
    expect(await store.delete('workInProgress')).toBe(false);
  });
});

describe('StateStore', () => {
  let documents: MemoryDocumentStore;
  let store: StateStore;

  beforeEach(() => {
    documents = new MemoryDocumentStore();
    store = new StateStore(documents, () => NOW);
  });

  describe('mapping history', () => {
    it('should merge updates by normalized name', async () => {
      await store.recordMappings([{ name: 'Timber  Stud', unit: 'LM', costType: 'Material' }]);
      await store.recordMappings([{ name: ' timber stud ', unit: '', takeoffType: 'Linear' }]);

      expect(await store.getMappingHistory()).toEqual([
        { name: 'timber stud', unit: 'LM', costType: 'Material', takeoffType: 'Linear', updatedAt: NOW.toISOString() },
      ]);
    });

    it('should skip nameless items and empty batches', async () => {
      expect(await store.recordMappings([])).toBe(0);
      expect(await store.recordMappings([{ name: '  ', unit: 'EA', costType: 'Other' }])).toBe(0);
      expect(documents.size).toBe(0);
    });

    it('should serialize concurrent updates', async () => {
      await Promise.all([
        store.recordMappings([{ name: 'Door', unit: 'EA', costType: 'Material' }]),
        store.recordMappings([{ name: 'Skirting', unit: 'LM', costType: 'Material' }]),
      ]);

      expect((await store.getMappingHistory()).map((entry) => entry.name)).toEqual(['Door', 'Skirting']);
    });

    it('should refuse a corrupt document', async () => {
      await documents.write('mappingHistory', '{"door": {"name": 42}}');

      await expect(store.getMappingHistory()).rejects.toMatchObject({ code: 'INVALID_DOCUMENT', document: 'mappingHistory' });
    });

    it('should refuse text that is not JSON', async () => {
      await documents.write('mappingHistory', 'not json');

      await expect(store.getMappingHistory()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('formula templates', () => {
    it('should create, update and delete templates', async () => {
      const created = await store.createFormulaTemplate({ name: 'Wall sheeting', formula: '[Length_m] * [Height_m]' });

      expect(created.createdAt).toBe(NOW.toISOString());
      expect(await store.listFormulaTemplates()).toEqual([created]);

      const updated = await store.updateFormulaTemplate(created.id, { takeoffType: 'Area' });
      expect(updated).toEqual({ ...created, takeoffType: 'Area' });
      expect(await store.getFormulaTemplate(created.id)).toEqual(updated);

      expect(await store.deleteFormulaTemplate(created.id)).toBe(true);
      expect(await store.deleteFormulaTemplate(created.id)).toBe(false);
      expect(await store.listFormulaTemplates()).toEqual([]);
    });

    it('should return null when updating an unknown template', async () => {
      expect(await store.updateFormulaTemplate('missing', { name: 'Renamed' })).toBeNull();
    });

    it('should validate template input', async () => {
      await expect(store.createFormulaTemplate({ name: '', formula: '[Count]' })).rejects.toThrow();
      expect(documents.size).toBe(0);
    });
  });

  describe('import templates', () => {
    it('should apply schema defaults', async () => {
      const template = await store.createImportTemplate({ name: 'Databuild', fieldMapping: { sku: 'Code' } });

      expect(template.unitSystem).toBe('metric');
      expect(template.customMappings).toEqual({});
      expect(await store.getImportTemplate(template.id)).toEqual(template);
      expect(await store.deleteImportTemplate(template.id)).toBe(true);
    });
  });

  describe('work in progress', () => {
    it('should save, load and clear the snapshot', async () => {
      const session = new ConversionSession(
        { sourceName: 'estimate.csv', columns: ['Name'], rows: [{ Name: 'Door' }] },
        { unitSystem: 'metric', fieldMapping: {}, customMappings: {} }
      );
      const snapshot = session.toSnapshot(NOW);

      await store.saveSnapshot(snapshot);

      expect(await store.loadSnapshot()).toEqual(snapshot);
      expect(await store.clearSnapshot()).toBe(true);
      expect(await store.loadSnapshot()).toBeNull();
    });

    it('should persist through the file store', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'converter-wip-'));
      try {
        const fileStore = new StateStore(new FileDocumentStore(dir), () => NOW);
        await writeFile(join(dir, 'work-in-progress.json'), '{"version": 99}', 'utf8');

        await expect(fileStore.loadSnapshot()).rejects.toBeInstanceOf(StorageError);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });
});
