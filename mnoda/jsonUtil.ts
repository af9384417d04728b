import type { Json, JsonObject } from '../types.ts';
import { EmptyFieldError, InvalidFieldTypeError, MissingFieldError } from './errors.ts';

/**
 * Name of a value's JSON type, as reported in validation errors.
 */
export const jsonTypeName = (value: unknown): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
};

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const requireObject = (value: unknown, fieldName: string, typeName: string): JsonObject => {
  if (!isJsonObject(value)) {
    throw new InvalidFieldTypeError(fieldName, typeName, 'object', jsonTypeName(value));
  }
  return value;
};

export const requireNonEmpty = (value: string, fieldName: string, typeName: string): string => {
  if (value.length === 0) {
    throw new EmptyFieldError(fieldName, typeName);
  }
  return value;
};

export const getRequiredField = (fieldName: string, json: JsonObject, typeName: string): Json => {
  const value = json[fieldName];
  if (value === undefined) {
    throw new MissingFieldError(fieldName, typeName);
  }
  return value;
};

export const getRequiredString = (fieldName: string, json: JsonObject, typeName: string): string => {
  const value = getRequiredField(fieldName, json, typeName);
  if (typeof value !== 'string') {
    throw new InvalidFieldTypeError(fieldName, typeName, 'string', jsonTypeName(value));
  }
  return value;
};

/**
 * Absent optional strings read as ''.
 */
export const getOptionalString = (fieldName: string, json: JsonObject, typeName: string): string => {
  const value = json[fieldName];
  if (value === undefined) return '';
  if (typeof value !== 'string') {
    throw new InvalidFieldTypeError(fieldName, typeName, 'string', jsonTypeName(value));
  }
  return value;
};

export const getOptionalArray = (fieldName: string, json: JsonObject, typeName: string): Json[] => {
  const value = json[fieldName];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new InvalidFieldTypeError(fieldName, typeName, 'array', jsonTypeName(value));
  }
  return value;
};

export const getOptionalStringArray = (fieldName: string, json: JsonObject, typeName: string): string[] =>
  getOptionalArray(fieldName, json, typeName).map((entry) => {
    if (typeof entry !== 'string') {
      throw new InvalidFieldTypeError(fieldName, typeName, 'string', jsonTypeName(entry));
    }
    return entry;
  });
