import type { RelationshipJson } from '../types.ts';
import { ID, IDField } from './id.ts';
import { getRequiredString, requireNonEmpty, requireObject } from './jsonUtil.ts';

const RELATIONSHIP_TYPE_NAME = 'Relationship';

const KEYS = {
  SUBJECT: 'subject',
  LOCAL_SUBJECT: 'local_subject',
  PREDICATE: 'predicate',
  OBJECT: 'object',
  LOCAL_OBJECT: 'local_object',
};

/**
 * A directed link between two Records, read as "<subject> <predicate> <object>",
 * e.g. "Task_22 contains Run_1024". Predicates should be in the active voice
 * so the direction stays constant.
 *
 * Endpoints are written as plain strings under "subject" and "object". Local
 * endpoints are mapped to global IDs when the document is ingested, outside
 * this library.
 */
export class Relationship {
  private readonly subject: IDField;
  private readonly predicate: string;
  private readonly object: IDField;

  constructor(subject: ID, predicate: string, object: ID) {
    this.subject = new IDField(subject, KEYS.LOCAL_SUBJECT, KEYS.SUBJECT);
    this.predicate = requireNonEmpty(predicate, KEYS.PREDICATE, RELATIONSHIP_TYPE_NAME);
    this.object = new IDField(object, KEYS.LOCAL_OBJECT, KEYS.OBJECT);
  }

  static fromJson(json: unknown): Relationship {
    const asObject = requireObject(json, 'relationships', RELATIONSHIP_TYPE_NAME);
    const subject = IDField.fromJson(asObject, KEYS.LOCAL_SUBJECT, KEYS.SUBJECT, RELATIONSHIP_TYPE_NAME);
    const predicate = getRequiredString(KEYS.PREDICATE, asObject, RELATIONSHIP_TYPE_NAME);
    const object = IDField.fromJson(asObject, KEYS.LOCAL_OBJECT, KEYS.OBJECT, RELATIONSHIP_TYPE_NAME);
    return new Relationship(subject.id, predicate, object.id);
  }

  getSubject(): ID {
    return this.subject.id;
  }

  getPredicate(): string {
    return this.predicate;
  }

  getObject(): ID {
    return this.object.id;
  }

  equals(other: Relationship): boolean {
    return this.predicate === other.predicate
      && this.getSubject().equals(other.getSubject())
      && this.getObject().equals(other.getObject());
  }

  toJson(): RelationshipJson {
    return {
      subject: this.getSubject().getId(),
      predicate: this.predicate,
      object: this.getObject().getId(),
    };
  }
}
