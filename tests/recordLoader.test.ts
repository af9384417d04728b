import { describe, it, expect, vi } from 'vitest';
import { RecordLoader, createRecordLoaderWithAllKnownTypes } from '../mnoda/recordLoader.ts';
import { parseRecordFields, Record } from '../mnoda/record.ts';
import { Run } from '../mnoda/run.ts';
import { ID } from '../mnoda/id.ts';
import { getRequiredString } from '../mnoda/jsonUtil.ts';
import { MissingFieldError } from '../mnoda/errors.ts';
import type { JsonObject, RecordJson } from '../types.ts';

class LabelledRecord extends Record {
    private readonly label: string;

    constructor(id: ID, type: string, label: string) {
        super(id, type);
        this.label = label;
    }

    static override fromJson(json: unknown): LabelledRecord {
        const fields = parseRecordFields(json, 'LabelledRecord');
        return new LabelledRecord(fields.id, fields.type, getRequiredString('label', fields.json, 'LabelledRecord'))
            .assignFields(fields);
    }

    getLabel(): string {
        return this.label;
    }

    override toJson(): RecordJson {
        const json = super.toJson();
        json['label'] = this.label;
        return json;
    }
}

describe('RecordLoader', () => {
    it('should fall back to a base Record for unknown types', () => {
        const loader = new RecordLoader();
        const loaded = loader.load({ id: 'the ID', type: 'unknownType' });

        expect(loaded.constructor).toBe(Record);
        expect(loaded.getType()).toBe('unknownType');
        expect(loaded.getId().getId()).toBe('the ID');
    });

    it('should report the fallback explicitly from resolve', () => {
        const loader = new RecordLoader();
        const result = loader.resolve({ id: 'the ID', type: 'unknownType' });
        expect(result.status).toBe('unrecognized');
        expect(result.type).toBe('unknownType');
    });

    it('should dispatch to a registered factory', () => {
        const loader = new RecordLoader();
        expect(loader.canLoad('labelled')).toBe(false);

        const factory = vi.fn((json: JsonObject) => LabelledRecord.fromJson(json));
        loader.addTypeLoader('labelled', factory);
        expect(loader.canLoad('labelled')).toBe(true);

        const json = { id: 'the ID', type: 'labelled', label: 'The value' };
        const result = loader.resolve(json);

        expect(factory).toHaveBeenCalledTimes(1);
        expect(factory).toHaveBeenCalledWith(json);
        expect(result.status).toBe('registered');
        expect(result.record).toBeInstanceOf(LabelledRecord);
        if (result.record instanceof LabelledRecord) {
            expect(result.record.getLabel()).toBe('The value');
        }
        expect(result.record.toJson()).toEqual(json);
    });

    it('should let the last registration win', () => {
        const loader = new RecordLoader();
        const first = vi.fn((json: JsonObject) => Record.fromJson(json));
        const second = vi.fn((json: JsonObject) => Record.fromJson(json));
        loader.addTypeLoader('x', first);
        loader.addTypeLoader('x', second);

        loader.load({ type: 'x', local_id: 'a' });

        expect(first).not.toHaveBeenCalled();
        expect(second).toHaveBeenCalledTimes(1);
        expect(loader.getRegisteredTypes()).toEqual(['x']);
    });

    it('should fail when the type is missing', () => {
        const loader = new RecordLoader();
        expect(() => loader.load({ id: 'the ID' })).toThrow(MissingFieldError);
    });

    it('should know about runs when built with all known types', () => {
        const loader = createRecordLoaderWithAllKnownTypes();
        expect(loader.canLoad('run')).toBe(true);

        const loaded = loader.load({ type: 'run', local_id: 'r1', application: 'kripke' });
        expect(loaded).toBeInstanceOf(Run);
    });
});
