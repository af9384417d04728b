import { DatumType, type DatumJson, type DatumValue } from '../types.ts';
import { InvalidFieldTypeError } from './errors.ts';
import {
  getOptionalString,
  getOptionalStringArray,
  getRequiredField,
  getRequiredString,
  jsonTypeName,
  requireNonEmpty,
  requireObject
} from './jsonUtil.ts';

const DATUM_TYPE_NAME = 'Datum';

const KEYS = {
  NAME: 'name',
  VALUE: 'value',
  UNITS: 'units',
  TAGS: 'tags',
};

/**
 * A named value attached to a Record: either a string or a scalar, with
 * optional units and tags.
 *
 * ```ts
 * const density = new Datum('density', 2.22);
 * density.setUnits('g/L');
 * density.toJson(); // { name: 'density', value: 2.22, units: 'g/L' }
 * ```
 */
export class Datum {
  private readonly name: string;
  private readonly value: DatumValue;
  private units = '';
  private tags: string[] = [];

  constructor(name: string, value: DatumValue) {
    this.name = requireNonEmpty(name, KEYS.NAME, DATUM_TYPE_NAME);
    // NaN and Infinity have no JSON form
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new InvalidFieldTypeError(KEYS.VALUE, DATUM_TYPE_NAME, 'a finite number', String(value));
    }
    this.value = value;
  }

  static fromJson(json: unknown): Datum {
    const asObject = requireObject(json, 'data', DATUM_TYPE_NAME);
    const value = getRequiredField(KEYS.VALUE, asObject, DATUM_TYPE_NAME);
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new InvalidFieldTypeError(KEYS.VALUE, DATUM_TYPE_NAME, 'a string or a number', jsonTypeName(value));
    }
    const datum = new Datum(getRequiredString(KEYS.NAME, asObject, DATUM_TYPE_NAME), value);
    datum.units = getOptionalString(KEYS.UNITS, asObject, DATUM_TYPE_NAME);
    datum.tags = getOptionalStringArray(KEYS.TAGS, asObject, DATUM_TYPE_NAME);
    return datum;
  }

  clone(): Datum {
    const copy = new Datum(this.name, this.value);
    copy.units = this.units;
    copy.tags = [...this.tags];
    return copy;
  }

  getName(): string {
    return this.name;
  }

  getValue(): DatumValue {
    return this.value;
  }

  getType(): DatumType {
    return typeof this.value === 'number' ? DatumType.SCALAR : DatumType.STRING;
  }

  getString(): string {
    if (typeof this.value !== 'string') {
      throw new InvalidFieldTypeError(KEYS.VALUE, DATUM_TYPE_NAME, 'a string', jsonTypeName(this.value));
    }
    return this.value;
  }

  getScalar(): number {
    if (typeof this.value !== 'number') {
      throw new InvalidFieldTypeError(KEYS.VALUE, DATUM_TYPE_NAME, 'a number', jsonTypeName(this.value));
    }
    return this.value;
  }

  getUnits(): string {
    return this.units;
  }

  setUnits(units: string): void {
    this.units = units;
  }

  getTags(): readonly string[] {
    return this.tags;
  }

  setTags(tags: readonly string[]): void {
    this.tags = [...tags];
  }

  toJson(): DatumJson {
    const json: DatumJson = { name: this.name, value: this.value };
    if (this.units) {
      json[KEYS.UNITS] = this.units;
    }
    if (this.tags.length > 0) {
      json[KEYS.TAGS] = [...this.tags];
    }
    return json;
  }
}

