import { describe, it, expect } from 'vitest';
import { Relationship } from '../mnoda/relationship.ts';
import { ID } from '../mnoda/id.ts';
import { EmptyFieldError, MissingFieldError } from '../mnoda/errors.ts';
import { IDType } from '../types.ts';

describe('Relationship', () => {
    it('should encode exactly subject, predicate and object', () => {
        const relationship = new Relationship(
            new ID('Task_22', IDType.GLOBAL),
            'contains',
            new ID('Run_1024', IDType.GLOBAL)
        );
        expect(relationship.toJson()).toEqual({ subject: 'Task_22', predicate: 'contains', object: 'Run_1024' });
    });

    it('should write local endpoints under the plain keys', () => {
        const relationship = new Relationship(
            new ID('local_task_12', IDType.LOCAL),
            'runs before',
            new ID('local_run_14', IDType.LOCAL)
        );
        expect(relationship.toJson()).toEqual({
            subject: 'local_task_12',
            predicate: 'runs before',
            object: 'local_run_14'
        });
    });

    it('should decode subject and object as global ids', () => {
        const relationship = Relationship.fromJson({ subject: 'msub_1_1', predicate: 'describes', object: 'out_j_1_1' });
        expect(relationship.getSubject().equals(new ID('msub_1_1', IDType.GLOBAL))).toBe(true);
        expect(relationship.getPredicate()).toBe('describes');
        expect(relationship.getObject().equals(new ID('out_j_1_1', IDType.GLOBAL))).toBe(true);
    });

    it('should decode local_subject and local_object as local ids', () => {
        const relationship = Relationship.fromJson({ local_subject: 'a', predicate: 'knows', local_object: 'b' });
        expect(relationship.getSubject().getType()).toBe(IDType.LOCAL);
        expect(relationship.getObject().getType()).toBe(IDType.LOCAL);
        expect(relationship.toJson()).toEqual({ subject: 'a', predicate: 'knows', object: 'b' });
    });

    it('should require every part of the triple', () => {
        expect(() => Relationship.fromJson({ predicate: 'p', object: 'o' })).toThrow(
            "The required field 'subject' is missing from Relationship."
        );
        expect(() => Relationship.fromJson({ subject: 's', object: 'o' })).toThrow(
            "The required field 'predicate' is missing from Relationship."
        );
        expect(() => Relationship.fromJson({ subject: 's', predicate: 'p' })).toThrow(MissingFieldError);
    });

    it('should reject an empty predicate', () => {
        expect(() => Relationship.fromJson({ subject: 's', predicate: '', object: 'o' })).toThrow(EmptyFieldError);
    });

    it('should compare by triple', () => {
        const a = Relationship.fromJson({ subject: 's', predicate: 'p', object: 'o' });
        expect(a.equals(Relationship.fromJson({ subject: 's', predicate: 'p', object: 'o' }))).toBe(true);
        expect(a.equals(Relationship.fromJson({ subject: 'o', predicate: 'p', object: 's' }))).toBe(false);
    });
});
