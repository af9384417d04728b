import { describe, it, expect } from 'vitest';
import { FileReference } from '../mnoda/file.ts';
import { EmptyFieldError, InvalidFieldTypeError, MissingFieldError } from '../mnoda/errors.ts';

describe('FileReference', () => {
    it('should decode uri, mimetype and tags', () => {
        const file = FileReference.fromJson({ uri: 'out/plot.png', mimetype: 'image/png', tags: ['plot'] });
        expect(file.getUri()).toBe('out/plot.png');
        expect(file.getMimeType()).toBe('image/png');
        expect(file.getTags()).toEqual(['plot']);
    });

    it('should require a uri', () => {
        expect(() => FileReference.fromJson({ mimetype: 'text/plain' })).toThrow(MissingFieldError);
        expect(() => FileReference.fromJson({ mimetype: 'text/plain' })).toThrow(
            "The required field 'uri' is missing from File."
        );
    });

    it('should reject non-string tags', () => {
        expect(() => FileReference.fromJson({ uri: 'a', tags: [{}] })).toThrow(
            "The field 'tags' of File must be string. Found 'object' instead."
        );
    });

    it('should reject a non-object entry', () => {
        expect(() => FileReference.fromJson('uri1')).toThrow(InvalidFieldTypeError);
    });

    it('should reject an empty uri', () => {
        expect(() => new FileReference('')).toThrow(EmptyFieldError);
    });

    it('should encode only the fields that are set', () => {
        const file = new FileReference('uri1');
        expect(file.toJson()).toEqual({ uri: 'uri1' });

        file.setMimeType('mt1');
        file.setTags(['t1', 't2']);
        expect(file.toJson()).toEqual({ uri: 'uri1', mimetype: 'mt1', tags: ['t1', 't2'] });
    });
});
