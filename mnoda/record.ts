import type { Json, JsonObject, RecordJson } from '../types.ts';
import { Datum } from './datum.ts';
import { InvalidFieldTypeError } from './errors.ts';
import { FileReference } from './file.ts';
import { ID, IDField } from './id.ts';
import { getOptionalArray, getRequiredString, isJsonObject, jsonTypeName, requireNonEmpty, requireObject } from './jsonUtil.ts';

export const RECORD_TYPE_NAME = 'Record';

export const RECORD_KEYS = {
  TYPE: 'type',
  LOCAL_ID: 'local_id',
  GLOBAL_ID: 'id',
  DATA: 'data',
  FILES: 'files',
  USER_DEFINED: 'user_defined',
};

export interface RecordFields {
  id: ID;
  type: string;
  data: Datum[];
  files: FileReference[];
  userDefined: Json;
}

/**
 * Reads the fields every record shares. Subtypes call this first and then
 * read their own keys from the same object.
 */
export const parseRecordFields = (json: unknown, typeName: string = RECORD_TYPE_NAME): RecordFields & { json: JsonObject } => {
  const asObject = requireObject(json, 'records', typeName);
  const type = requireNonEmpty(getRequiredString(RECORD_KEYS.TYPE, asObject, typeName), RECORD_KEYS.TYPE, typeName);
  const idField = IDField.fromJson(asObject, RECORD_KEYS.LOCAL_ID, RECORD_KEYS.GLOBAL_ID, typeName);
  const data = getOptionalArray(RECORD_KEYS.DATA, asObject, typeName).map((entry) => Datum.fromJson(entry));
  const files = getOptionalArray(RECORD_KEYS.FILES, asObject, typeName).map((entry) => FileReference.fromJson(entry));
  const userDefined = structuredClone(asObject[RECORD_KEYS.USER_DEFINED] ?? null);

  return { json: asObject, id: idField.id, type, data, files, userDefined };
};

/**
 * The base of every entry in a document's "records" list. Records carry an
 * identity, a type tag, data, files and free-form user-defined content.
 *
 * Subtypes such as Run add typed fields on top: they extend `toJson()` by
 * appending their keys to `super.toJson()`, and build themselves from JSON
 * through `parseRecordFields()`.
 */
export class Record {
  private readonly id: ID;
  private readonly type: string;
  private data: Datum[] = [];
  private files: FileReference[] = [];
  private userDefined: Json = null;

  constructor(id: ID, type: string) {
    this.id = id;
    this.type = requireNonEmpty(type, RECORD_KEYS.TYPE, RECORD_TYPE_NAME);
  }

  static fromJson(json: unknown): Record {
    const fields = parseRecordFields(json);
    return new Record(fields.id, fields.type).assignFields(fields);
  }

  /**
   * Copies the shared collections parsed by `parseRecordFields()` onto this
   * record.
   */
  protected assignFields(fields: RecordFields): this {
    this.data = [...fields.data];
    this.files = [...fields.files];
    this.userDefined = fields.userDefined;
    return this;
  }

  getId(): ID {
    return this.id;
  }

  getType(): string {
    return this.type;
  }

  getData(): readonly Datum[] {
    return this.data;
  }

  getFiles(): readonly FileReference[] {
    return this.files;
  }

  add(entry: Datum | FileReference): void {
    if (entry instanceof Datum) {
      this.data.push(entry.clone());
    } else {
      this.files.push(entry.clone());
    }
  }

  /**
   * The stored value itself, not a copy. Editing a nested object or array
   * edits this record.
   */
  getUserDefinedContent(): Json {
    return this.userDefined;
  }

  /**
   * Live object view of the user-defined content, for setting keys one at a
   * time. Null content becomes an empty object first.
   */
  getUserDefinedObject(): JsonObject {
    if (this.userDefined === null) {
      this.userDefined = {};
    }
    if (!isJsonObject(this.userDefined)) {
      throw new InvalidFieldTypeError(RECORD_KEYS.USER_DEFINED, RECORD_TYPE_NAME, 'an object', jsonTypeName(this.userDefined));
    }
    return this.userDefined;
  }

  setUserDefinedContent(content: Json): void {
    this.userDefined = structuredClone(content);
  }

  toJson(): RecordJson {
    const json: RecordJson = { type: this.type };
    new IDField(this.id, RECORD_KEYS.LOCAL_ID, RECORD_KEYS.GLOBAL_ID).addTo(json);
    if (this.data.length > 0) {
      json[RECORD_KEYS.DATA] = this.data.map((datum) => datum.toJson());
    }
    if (this.files.length > 0) {
      json[RECORD_KEYS.FILES] = this.files.map((file) => file.toJson());
    }
    if (this.userDefined !== null) {
      json[RECORD_KEYS.USER_DEFINED] = structuredClone(this.userDefined);
    }
    return json;
  }
}
