import { IDType, type JsonObject } from '../types.ts';
import { MissingFieldError } from './errors.ts';
import { getRequiredString, requireNonEmpty } from './jsonUtil.ts';

/**
 * Identifies a Record. A local ID is unique within one document, a global ID
 * within a whole database. Local IDs are swapped for global ones on ingestion.
 */
export class ID {
  private readonly id: string;
  private readonly type: IDType;

  constructor(id: string, type: IDType) {
    this.id = requireNonEmpty(id, 'id', 'ID');
    this.type = type;
  }

  getId(): string {
    return this.id;
  }

  getType(): IDType {
    return this.type;
  }

  isLocal(): boolean {
    return this.type === IDType.LOCAL;
  }

  isGlobal(): boolean {
    return this.type === IDType.GLOBAL;
  }

  equals(other: ID): boolean {
    return this.id === other.id && this.type === other.type;
  }

  toString(): string {
    return `${this.type}:${this.id}`;
  }
}

/**
 * An ID bound to the two JSON keys it can appear under. Only one of the keys
 * is ever written, chosen by the ID's type.
 */
export class IDField {
  constructor(
    readonly id: ID,
    readonly localKey: string,
    readonly globalKey: string
  ) {}

  static fromJson(json: JsonObject, localKey: string, globalKey: string, typeName: string): IDField {
    if (json[globalKey] !== undefined) {
      const value = requireNonEmpty(getRequiredString(globalKey, json, typeName), globalKey, typeName);
      return new IDField(new ID(value, IDType.GLOBAL), localKey, globalKey);
    }
    if (json[localKey] !== undefined) {
      const value = requireNonEmpty(getRequiredString(localKey, json, typeName), localKey, typeName);
      return new IDField(new ID(value, IDType.LOCAL), localKey, globalKey);
    }
    throw new MissingFieldError(globalKey, typeName);
  }

  getKey(): string {
    return this.id.isLocal() ? this.localKey : this.globalKey;
  }

  addTo(json: JsonObject): void {
    json[this.getKey()] = this.id.getId();
  }
}
