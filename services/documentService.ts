import { readFile, writeFile } from 'fs/promises';
import { Document } from '../mnoda/document.ts';
import { DocumentIOError, DocumentSyntaxError } from '../mnoda/errors.ts';
import { createRecordLoaderWithAllKnownTypes, type RecordLoader } from '../mnoda/recordLoader.ts';
import { loggerService } from './loggerService.ts';
import { settingsService } from './settingsService.ts';

export const documentService = {
  /**
   * JSON text of `document.toJson()`, indented per the serialization settings.
   */
  serialize: (document: Document): string => {
    const { indent } = settingsService.getSerializationSettings();
    return JSON.stringify(document.toJson(), null, indent);
  },

  parse: (text: string, recordLoader: RecordLoader): Document => {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new DocumentSyntaxError(error instanceof Error ? error.message : String(error), { cause: error });
    }
    return Document.fromJson(json, recordLoader);
  },

  /**
   * Writes the document as UTF-8 JSON, overwriting any existing file.
   */
  save: async (document: Document, path: string): Promise<void> => {
    const text = documentService.serialize(document);
    try {
      await writeFile(path, text, 'utf-8');
    } catch (error) {
      loggerService.error('DocumentService: Failed to save document', { path, error });
      throw new DocumentIOError(path, 'save', error);
    }
    loggerService.info('DocumentService: Saved document', {
      path,
      records: document.getRecords().length,
      relationships: document.getRelationships().length
    });
  },

  /**
   * Reads and decodes a document. Without a loader only the built-in record
   * types come back as their own classes; everything else loads as Record.
   */
  load: async (path: string, recordLoader: RecordLoader = createRecordLoaderWithAllKnownTypes()): Promise<Document> => {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      loggerService.error('DocumentService: Failed to read document', { path, error });
      throw new DocumentIOError(path, 'load', error);
    }
    const document = documentService.parse(text, recordLoader);
    loggerService.info('DocumentService: Loaded document', {
      path,
      records: document.getRecords().length,
      relationships: document.getRelationships().length
    });
    return document;
  },
};
