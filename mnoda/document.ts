import type { DocumentJson } from '../types.ts';
import { loggerService } from '../services/loggerService.ts';
import { getOptionalArray, requireObject } from './jsonUtil.ts';
import type { Record } from './record.ts';
import type { RecordLoader } from './recordLoader.ts';
import { Relationship } from './relationship.ts';

const DOCUMENT_TYPE_NAME = 'Document';

const KEYS = {
  RECORDS: 'records',
  RELATIONSHIPS: 'relationships',
};

/**
 * The top-level object of a Mnoda JSON file: a list of records and a list of
 * relationships between them.
 *
 * ```json
 * { "records": [], "relationships": [] }
 * ```
 *
 * Records are decoded through a RecordLoader, so subtypes such as Run come back
 * as their own classes. Order is kept in both lists.
 */
export class Document {
  private readonly records: Record[] = [];
  private readonly relationships: Relationship[] = [];

  static fromJson(json: unknown, recordLoader: RecordLoader): Document {
    const asObject = requireObject(json, 'document', DOCUMENT_TYPE_NAME);
    const document = new Document();
    for (const entry of getOptionalArray(KEYS.RECORDS, asObject, DOCUMENT_TYPE_NAME)) {
      document.add(recordLoader.load(entry));
    }
    for (const entry of getOptionalArray(KEYS.RELATIONSHIPS, asObject, DOCUMENT_TYPE_NAME)) {
      document.add(Relationship.fromJson(entry));
    }
    loggerService.debug('Document: Decoded document', {
      records: document.records.length,
      relationships: document.relationships.length
    });
    return document;
  }

  add(record: Record): void;
  add(relationship: Relationship): void;
  add(entry: Record | Relationship): void {
    if (entry instanceof Relationship) {
      this.relationships.push(entry);
    } else {
      this.records.push(entry);
    }
  }

  getRecords(): readonly Record[] {
    return this.records;
  }

  getRelationships(): readonly Relationship[] {
    return this.relationships;
  }

  toJson(): DocumentJson {
    return {
      records: this.records.map((record) => record.toJson()),
      relationships: this.relationships.map((relationship) => relationship.toJson()),
    };
  }
}
