
// JSON values as they come out of JSON.parse
export type Json = null | boolean | number | string | Json[] | JsonObject;

export interface JsonObject {
  [key: string]: Json;
}

export enum IDType {
  LOCAL = 'local',
  GLOBAL = 'global'
}

export enum DatumType {
  STRING = 'string',
  SCALAR = 'scalar'
}

export type DatumValue = string | number;

// Wire shapes
export interface DatumJson extends JsonObject {
  name: string;
  value: DatumValue;
}

export interface FileJson extends JsonObject {
  uri: string;
}

export interface RecordJson extends JsonObject {
  type: string;
}

export interface RelationshipJson extends JsonObject {
  subject: string;
  predicate: string;
  object: string;
}

export interface DocumentJson extends JsonObject {
  records: RecordJson[];
  relationships: RelationshipJson[];
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogSettings {
  level: LogLevel;
}

export interface SerializationSettings {
  indent: number;
}
