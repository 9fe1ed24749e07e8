/**
 * Tests for the record model against a stubbed client.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Deadline } from '../client/deadline.js';
import {
  FieldValidationError,
  RecordConflictError,
  StaleRecordError,
  TimeoutError,
  UnknownFieldError,
} from '../errors.js';
import { DataRecord, type RecordContext } from '../models/record.js';
import { DEFAULT_DATE_FORMATS } from '../schema/date-format.js';
import type { FieldMetadata, FieldValue } from '../types/index.js';

function fieldMeta(name: string, overrides: Partial<FieldMetadata> = {}): FieldMetadata {
  return { name, type: 'normal', result: 'text', maxRepeat: 1, global: false, ...overrides };
}

const schema = {
  fields: new Map([
    ['name', fieldMeta('name')],
    ['city', fieldMeta('city')],
    ['age', fieldMeta('age', { result: 'number' })],
    ['label', fieldMeta('label', { type: 'calculation' })],
  ]),
  formats: DEFAULT_DATE_FORMATS,
};

function stubContext() {
  return {
    createRecord: vi.fn<RecordContext['createRecord']>(),
    editRecord: vi.fn<RecordContext['editRecord']>(),
    deleteRecord: vi.fn<RecordContext['deleteRecord']>(),
    getRecord: vi.fn<RecordContext['getRecord']>(),
    startDeadline: vi.fn<RecordContext['startDeadline']>(() => new Deadline(1000)),
  };
}

type StubContext = ReturnType<typeof stubContext>;

function contact(
  context: RecordContext,
  options: { modId?: number; city?: string; phoneModId?: number } = {}
): DataRecord {
  const fields = new Map<string, FieldValue>([
    ['name', 'Ann Lee'],
    ['city', options.city ?? 'Boston'],
    ['age', 31],
    ['label', 'Ann Lee (Boston)'],
  ]);
  return new DataRecord({
    context,
    scope: { kind: 'layout', layout: 'Contacts' },
    recordId: 3,
    modId: options.modId ?? 5,
    fields,
    schema,
    portals: (parent) =>
      new Map([
        [
          'Phones',
          [
            new DataRecord({
              context,
              scope: { kind: 'portal', portal: 'Phones', table: 'Phones', parent },
              recordId: 8,
              modId: options.phoneModId ?? 2,
              fields: new Map([['Phones::number', '555-0101']]),
            }),
          ],
        ],
      ]),
  });
}

function phoneOf(record: DataRecord): DataRecord {
  const row = record.portals.get('Phones')?.[0];
  if (!row) {
    throw new Error('fixture has no phone row');
  }
  return row;
}

describe('DataRecord', () => {
  let context: StubContext;
  let record: DataRecord;

  beforeEach(() => {
    context = stubContext();
    record = contact(context);
  });

  describe('get and set', () => {
    it('should change values locally and track dirty fields', () => {
      record.set('city', 'Cambridge');

      expect(record.get('city')).toBe('Cambridge');
      expect([...record.dirtyFields]).toEqual(['city']);
      expect(record.dirtyFieldData()).toEqual({ city: 'Cambridge' });
      expect(context.editRecord).not.toHaveBeenCalled();
    });

    it('should ignore assignments of the current value', () => {
      record.set('city', 'Boston');
      expect(record.isDirty).toBe(false);
    });

    it('should reject unknown fields', () => {
      expect(() => record.get('nickname')).toThrow(UnknownFieldError);
      expect(() => record.set('nickname', 'A')).toThrow(UnknownFieldError);
    });

    it('should reject writes to calculation fields', () => {
      expect(() => record.set('label', 'x')).toThrow(
        'Field label: calculation fields cannot be modified'
      );
    });

    it('should reject values the field type cannot hold', () => {
      expect(() => record.set('age', new Date(0))).toThrow(FieldValidationError);
      expect(record.get('age')).toBe(31);
    });

    it('should expose fields named like structural attributes', () => {
      const odd = new DataRecord({
        context,
        scope: { kind: 'layout', layout: 'Contacts' },
        recordId: 4,
        modId: 1,
        fields: new Map([['recordId', 'R-100']]),
      });

      expect(odd.get('recordId')).toBe('R-100');
      expect(odd.recordId).toBe(4);
    });
  });

  describe('commit', () => {
    it('should do nothing without dirty fields', async () => {
      await record.commit();

      expect(context.editRecord).not.toHaveBeenCalled();
      expect(context.createRecord).not.toHaveBeenCalled();
    });

    it('should send only dirty fields with the modification id', async () => {
      context.editRecord.mockResolvedValue(6);
      record.set('city', 'Cambridge');

      await record.commit();

      expect(context.editRecord).toHaveBeenCalledWith(
        3,
        { city: 'Cambridge' },
        { layout: 'Contacts', modId: 5 }
      );
      expect(record.modId).toBe(6);
      expect(record.isDirty).toBe(false);
    });

    it('should leave local state untouched on conflict', async () => {
      context.editRecord.mockRejectedValue(
        new RecordConflictError('Record modification ID does not match', 500)
      );
      record.set('city', 'Cambridge');

      await expect(record.commit()).rejects.toThrow(RecordConflictError);

      expect(record.modId).toBe(5);
      expect(record.get('city')).toBe('Cambridge');
      expect([...record.dirtyFields]).toEqual(['city']);
    });

    it('should keep fields changed while the commit was in flight dirty', async () => {
      context.editRecord.mockImplementation(async () => {
        record.set('city', 'Somerville');
        return 6;
      });
      record.set('city', 'Cambridge');

      await record.commit();

      expect(record.get('city')).toBe('Somerville');
      expect([...record.dirtyFields]).toEqual(['city']);
      expect(record.modId).toBe(6);
    });

    it('should create a record that has no id yet', async () => {
      context.createRecord.mockResolvedValue({ recordId: 11, modId: 0 });
      const draft = new DataRecord({
        context,
        scope: { kind: 'layout', layout: 'Contacts' },
        recordId: null,
        modId: null,
        fields: new Map([['name', 'Zed Park']]),
      });

      expect(draft.isDirty).toBe(true);
      await draft.commit();

      expect(context.createRecord).toHaveBeenCalledWith({ name: 'Zed Park' }, { layout: 'Contacts' });
      expect(draft.recordId).toBe(11);
      expect(draft.modId).toBe(0);
      expect(draft.isDirty).toBe(false);
    });

    it('should commit a portal row through its parent', async () => {
      context.editRecord.mockResolvedValue(6);
      context.getRecord.mockResolvedValue(contact(context, { modId: 6, phoneModId: 3 }));
      const phone = phoneOf(record);
      phone.set('Phones::number', '555-0199');

      await phone.commit();

      expect(context.editRecord).toHaveBeenCalledWith(
        3,
        {},
        {
          layout: 'Contacts',
          deadline: expect.any(Deadline),
          portalData: {
            Phones: [{ 'Phones::number': '555-0199', recordId: '8', modId: '2' }],
          },
        }
      );
      expect(phone.modId).toBe(3);
      expect(record.modId).toBe(6);
      expect(phone.isDirty).toBe(false);
    });

    it('should share one deadline between the row edit and the parent re-read', async () => {
      context.editRecord.mockResolvedValue(6);
      context.getRecord.mockResolvedValue(contact(context, { modId: 6, phoneModId: 4 }));
      const phone = phoneOf(record);
      phone.set('Phones::number', '555-0199');

      await phone.commit({ timeout: 500 });

      expect(context.startDeadline).toHaveBeenCalledTimes(1);
      expect(context.startDeadline).toHaveBeenCalledWith({ timeout: 500 });
      const editDeadline = context.editRecord.mock.calls[0][2]?.deadline;
      expect(editDeadline).toBeInstanceOf(Deadline);
      expect(context.getRecord.mock.calls[0][1]?.deadline).toBe(editDeadline);
      expect(phone.modId).toBe(4);
    });

    it('should keep a stored row edit when the parent cannot be re-read', async () => {
      context.editRecord.mockResolvedValue(6);
      context.getRecord.mockRejectedValue(new TimeoutError(1000));
      const phone = phoneOf(record);
      phone.set('Phones::number', '555-0199');

      await phone.commit();

      expect(phone.isDirty).toBe(false);
      expect(phone.get('Phones::number')).toBe('555-0199');
      expect(phone.modId).toBe(3);
      expect(record.modId).toBe(6);
    });
  });

  describe('reload', () => {
    it('should replace fields and discard local edits', async () => {
      context.getRecord.mockResolvedValue(contact(context, { modId: 9, city: 'Salem' }));
      record.set('city', 'Cambridge');

      await record.reload();

      expect(context.getRecord).toHaveBeenCalledWith(3, { layout: 'Contacts' });
      expect(record.get('city')).toBe('Salem');
      expect(record.modId).toBe(9);
      expect(record.isDirty).toBe(false);
    });

    it('should be idempotent', async () => {
      context.getRecord.mockImplementation(async () => contact(context, { modId: 9, city: 'Salem' }));

      await record.reload();
      const first = record.toJSON();
      await record.reload();

      expect(record.toJSON()).toEqual(first);
    });

    it('should re-parent reloaded portal rows', async () => {
      context.getRecord.mockResolvedValue(contact(context, { modId: 9 }));

      await record.reload();
      const phone = phoneOf(record);

      expect(phone.scope.kind === 'portal' && phone.scope.parent).toBe(record);
    });

    it('should fail for a portal row that is gone', async () => {
      const withoutPhones = new DataRecord({
        context,
        scope: { kind: 'layout', layout: 'Contacts' },
        recordId: 3,
        modId: 7,
        fields: new Map(),
      });
      context.getRecord.mockResolvedValue(withoutPhones);

      await expect(phoneOf(record).reload()).rejects.toThrow(
        'Row 8 is no longer part of portal Phones'
      );
    });
  });

  describe('delete', () => {
    it('should delete and refuse further use', async () => {
      context.deleteRecord.mockResolvedValue(undefined);

      await record.delete();

      expect(context.deleteRecord).toHaveBeenCalledWith(3, { layout: 'Contacts' });
      expect(record.isDeleted).toBe(true);
      await expect(record.commit()).rejects.toThrow('Record 3 has been deleted');
      await expect(record.reload()).rejects.toThrow(StaleRecordError);
      expect(context.getRecord).not.toHaveBeenCalled();
    });

    it('should delete a portal row through its parent', async () => {
      context.editRecord.mockResolvedValue(6);
      const phone = phoneOf(record);

      await phone.delete();

      expect(context.editRecord).toHaveBeenCalledWith(
        3,
        { deleteRelated: 'Phones.8' },
        { layout: 'Contacts' }
      );
      expect(record.portals.get('Phones')).toEqual([]);
      expect(record.modId).toBe(6);
      expect(phone.isDeleted).toBe(true);
    });

    it('should refuse to delete an unsaved record', async () => {
      const draft = new DataRecord({
        context,
        scope: { kind: 'layout', layout: 'Contacts' },
        recordId: null,
        modId: null,
        fields: new Map(),
      });

      await expect(draft.delete()).rejects.toThrow('Record has no record id');
    });
  });

  describe('toJSON', () => {
    it('should include identity, fields and portal rows', () => {
      expect(record.toJSON()).toEqual({
        recordId: 3,
        modId: 5,
        fieldData: { name: 'Ann Lee', city: 'Boston', age: 31, label: 'Ann Lee (Boston)' },
        portalData: {
          Phones: [
            { recordId: 8, modId: 2, fieldData: { 'Phones::number': '555-0101' }, portalData: {} },
          ],
        },
      });
    });
  });
});
