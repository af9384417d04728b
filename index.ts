export * from './types.ts';
export * from './mnoda/errors.ts';
export { ID, IDField } from './mnoda/id.ts';
export { Datum } from './mnoda/datum.ts';
export { FileReference } from './mnoda/file.ts';
export { Record, parseRecordFields, RECORD_KEYS, type RecordFields } from './mnoda/record.ts';
export { Run, RUN_TYPE } from './mnoda/run.ts';
export { Relationship } from './mnoda/relationship.ts';
export {
  RecordLoader,
  createRecordLoaderWithAllKnownTypes,
  type LoadedRecord,
  type RecordFactory
} from './mnoda/recordLoader.ts';
export { Document } from './mnoda/document.ts';
export { documentService } from './services/documentService.ts';
export { loggerService, type LogMeta } from './services/loggerService.ts';
export { settingsService } from './services/settingsService.ts';
