import { describe, it, expect } from 'vitest';
import { AlignmentError } from '../../pipeline/errors.js';
import { ConversionSession, SessionBusyError } from '../session.js';
import { WorkInProgressSnapshotSchema } from '../snapshot.js';

const table = {
  sourceName: 'estimate.csv',
  columns: ['Name', 'Units', 'Colour'],
  rows: [
    { Name: 'Door', Units: 'EA', Colour: 'White' },
    { Name: 'Skirting', Units: 'LM', Colour: '' },
  ],
};

function createSession(): ConversionSession {
  return new ConversionSession(table, { unitSystem: 'metric', fieldMapping: {}, customMappings: {} });
}

describe('ConversionSession', () => {
  it('should build one record per row with empty engine fields', () => {
    const session = createSession();

    expect(session.rowCount).toBe(2);
    expect(session.fieldValues('costType')).toEqual(['', '']);
    expect(session.getRecord(1)?.name).toBe('Skirting');
    expect(session.getRecord(2)).toBeUndefined();
  });

  it('should freeze source rows', () => {
    const session = createSession();

    expect(Object.isFrozen(session.rows)).toBe(true);
    expect(Object.isFrozen(session.rows[0])).toBe(true);
  });

  it('should hand out record copies', () => {
    const session = createSession();
    const records = session.getRecords();
    const first = records[0];
    if (first) {
      first.name = 'Changed';
      first.extensions.Colour = 'Red';
    }

    expect(session.getRecord(0)?.name).toBe('Door');
    expect(session.getRecord(0)?.extensions).toEqual({});
  });

  it('should commit a full-length field', () => {
    const session = createSession();

    session.commitField('takeoffType', ['Count', 'Linear']);

    expect(session.fieldValues('takeoffType')).toEqual(['Count', 'Linear']);
  });

  it('should reject a misaligned commit and keep the records', () => {
    const session = createSession();

    expect(() => session.commitField('formula', ['[Count]'])).toThrow(AlignmentError);
    expect(session.fieldValues('formula')).toEqual(['', '']);
  });

  it('should re-derive extension columns on a mapping change and keep engine fields', () => {
    const session = createSession();
    session.commitField('costType', ['Material', 'Labor']);

    session.updateSettings({ customMappings: { Finish: 'Colour' } });

    expect(session.getRecords().map((record) => record.extensions)).toEqual([{ Finish: 'White' }, { Finish: '' }]);
    expect(session.fieldValues('costType')).toEqual(['Material', 'Labor']);
  });

  it('should change the unit system without remapping', () => {
    const session = createSession();

    session.updateSettings({ unitSystem: 'imperial' });

    expect(session.unitSystem).toBe('imperial');
    expect(session.customMappings).toEqual({});
  });

  it('should allow one run at a time', () => {
    const session = createSession();
    session.beginRun('costType');

    expect(() => session.beginRun('formula')).toThrow(SessionBusyError);
    expect(session.activeRun).toBe('costType');

    session.endRun();
    expect(session.activeRun).toBeNull();
  });

  it('should restore records and settings from a snapshot', () => {
    const session = createSession();
    session.updateSettings({ unitSystem: 'imperial', customMappings: { Finish: 'Colour' } });
    session.commitField('formula', ['[COUNT]', '[LENGTH_LF]']);

    const snapshot = WorkInProgressSnapshotSchema.parse(session.toSnapshot(new Date('2026-02-01T08:00:00.000Z')));
    const restored = ConversionSession.fromSnapshot(snapshot);

    expect(snapshot.savedAt).toBe('2026-02-01T08:00:00.000Z');
    expect(restored.id).not.toBe(session.id);
    expect(restored.getRecords()).toEqual(session.getRecords());
    expect(restored.unitSystem).toBe('imperial');
    expect(restored.customMappings).toEqual({ Finish: 'Colour' });
  });

  it('should reject snapshot records that do not match the rows', () => {
    const snapshot = createSession().toSnapshot();

    expect(() => ConversionSession.fromSnapshot({ ...snapshot, records: snapshot.records.slice(1) }))
      .toThrow(AlignmentError);
  });
});
