import type { JsonObject } from '../types.ts';
import { loggerService } from '../services/loggerService.ts';
import { getRequiredString, requireObject } from './jsonUtil.ts';
import { Record, RECORD_KEYS, RECORD_TYPE_NAME } from './record.ts';
import { Run, RUN_TYPE } from './run.ts';

export type RecordFactory = (json: JsonObject) => Record;

export type LoadedRecord =
  | { status: 'registered'; type: string; record: Record }
  | { status: 'unrecognized'; type: string; record: Record };

/**
 * Maps record type tags to the factories that build them. Tags nobody
 * registered still load, as plain Records, so documents that mention
 * retired or third-party types keep working.
 */
export class RecordLoader {
  private readonly typeLoaders = new Map<string, RecordFactory>();

  addTypeLoader(type: string, factory: RecordFactory): void {
    this.typeLoaders.set(type, factory);
  }

  canLoad(type: string): boolean {
    return this.typeLoaders.has(type);
  }

  getRegisteredTypes(): string[] {
    return [...this.typeLoaders.keys()];
  }

  resolve(json: unknown): LoadedRecord {
    const asObject = requireObject(json, 'records', RECORD_TYPE_NAME);
    const type = getRequiredString(RECORD_KEYS.TYPE, asObject, RECORD_TYPE_NAME);
    const factory = this.typeLoaders.get(type);
    if (factory) {
      return { status: 'registered', type, record: factory(asObject) };
    }
    loggerService.debug('RecordLoader: No loader registered, using base Record', { type });
    return { status: 'unrecognized', type, record: Record.fromJson(asObject) };
  }

  load(json: unknown): Record {
    return this.resolve(json).record;
  }
}

export const createRecordLoaderWithAllKnownTypes = (): RecordLoader => {
  const loader = new RecordLoader();
  loader.addTypeLoader(RUN_TYPE, (json) => Run.fromJson(json));
  return loader;
};
