import type { RecordJson } from '../types.ts';
import { ID } from './id.ts';
import { getOptionalString, getRequiredString } from './jsonUtil.ts';
import { parseRecordFields, Record } from './record.ts';

export const RUN_TYPE = 'run';

const RUN_TYPE_NAME = 'Run';

const KEYS = {
  APPLICATION: 'application',
  VERSION: 'version',
  USER: 'user',
};

/**
 * A Record describing one run of a simulation code.
 *
 * ```json
 * { "type": "run", "local_id": "run_1", "application": "kripke", "version": "1.2.3", "user": "jdoe" }
 * ```
 */
export class Run extends Record {
  private readonly application: string;
  private readonly version: string;
  private readonly user: string;

  constructor(id: ID, application: string, version = '', user = '') {
    super(id, RUN_TYPE);
    this.application = application;
    this.version = version;
    this.user = user;
  }

  static override fromJson(json: unknown): Run {
    const fields = parseRecordFields(json, RUN_TYPE_NAME);
    const run = new Run(
      fields.id,
      getRequiredString(KEYS.APPLICATION, fields.json, RUN_TYPE_NAME),
      getOptionalString(KEYS.VERSION, fields.json, RUN_TYPE_NAME),
      getOptionalString(KEYS.USER, fields.json, RUN_TYPE_NAME)
    );
    return run.assignFields(fields);
  }

  getApplication(): string {
    return this.application;
  }

  getVersion(): string {
    return this.version;
  }

  getUser(): string {
    return this.user;
  }

  override toJson(): RecordJson {
    const json = super.toJson();
    json[KEYS.APPLICATION] = this.application;
    if (this.version) {
      json[KEYS.VERSION] = this.version;
    }
    if (this.user) {
      json[KEYS.USER] = this.user;
    }
    return json;
  }
}
