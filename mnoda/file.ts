import type { FileJson } from '../types.ts';
import { getOptionalString, getOptionalStringArray, getRequiredString, requireNonEmpty, requireObject } from './jsonUtil.ts';

const FILE_TYPE_NAME = 'File';

const KEYS = {
  URI: 'uri',
  MIMETYPE: 'mimetype',
  TAGS: 'tags',
};

/**
 * A file associated with a Record, identified by its URI.
 */
export class FileReference {
  private readonly uri: string;
  private mimeType = '';
  private tags: string[] = [];

  constructor(uri: string) {
    this.uri = requireNonEmpty(uri, KEYS.URI, FILE_TYPE_NAME);
  }

  static fromJson(json: unknown): FileReference {
    const asObject = requireObject(json, 'files', FILE_TYPE_NAME);
    const file = new FileReference(getRequiredString(KEYS.URI, asObject, FILE_TYPE_NAME));
    file.mimeType = getOptionalString(KEYS.MIMETYPE, asObject, FILE_TYPE_NAME);
    file.tags = getOptionalStringArray(KEYS.TAGS, asObject, FILE_TYPE_NAME);
    return file;
  }

  clone(): FileReference {
    const copy = new FileReference(this.uri);
    copy.mimeType = this.mimeType;
    copy.tags = [...this.tags];
    return copy;
  }

  getUri(): string {
    return this.uri;
  }

  getMimeType(): string {
    return this.mimeType;
  }

  setMimeType(mimeType: string): void {
    this.mimeType = mimeType;
  }

  getTags(): readonly string[] {
    return this.tags;
  }

  setTags(tags: readonly string[]): void {
    this.tags = [...tags];
  }

  toJson(): FileJson {
    const json: FileJson = { uri: this.uri };
    if (this.mimeType) {
      json[KEYS.MIMETYPE] = this.mimeType;
    }
    if (this.tags.length > 0) {
      json[KEYS.TAGS] = [...this.tags];
    }
    return json;
  }
}
