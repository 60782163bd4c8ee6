import type { ApiResponse } from '../../domain/model/ApiResponse.js';
import type { RecordParameterInput } from '../../domain/services/RecordParameters.js';
import type { ApiContext } from '../ApiContext.js';
import type { EndpointOutcome } from '../invokeEndpoint.js';
import type { Patchable } from '../patchUpdate.js';
import { HTTP_OK } from '../../domain/model/ApiResponse.js';
import { RecordNotFoundError } from '../../domain/model/ApiError.js';
import { field } from '../../domain/model/FieldDefinition.js';
import { validate } from '../../domain/services/FieldValidator.js';
import { buildRecordFields, recordFieldsFromPayload } from '../../domain/services/RecordParameters.js';
import { isRecord, readString } from '../../domain/services/payload.js';
import { withPatchUpdate } from '../patchUpdate.js';

export interface RecordKeyArgs {
  readonly domainName?: string;
  readonly recordId?: number | string;
}

export interface RecordListArgs {
  readonly domainName?: string;
  /** Limit to one host. `@` is the zone apex. */
  readonly host?: string;
  /** Limit to one record type. */
  readonly recordType?: string;
}

export type RecordCreateArgs = Omit<RecordParameterInput, 'recordId'>;

/** Update arguments. `recordType` only selects the template; a record's type can never change. */
export type RecordUpdateArgs = RecordParameterInput;

export interface RecordTransferArgs {
  readonly domainName?: string;
  /** Domain name or IP address of the server to import from over AXFR. */
  readonly server?: string;
}

export interface RecordCopyArgs {
  readonly domainName?: string;
  readonly fromDomain?: string;
  /** Default: `false`. */
  readonly deleteCurrentRecords?: boolean;
}

/** DNS records of a zone. */
export class RecordApi {
  private readonly patchableUpdate: (args: Patchable<RecordUpdateArgs>) => Promise<EndpointOutcome>;

  constructor(private readonly ctx: ApiContext) {
    this.patchableUpdate = withPatchUpdate<RecordUpdateArgs, 'domainName' | 'recordId'>(
      (args) => this.sendUpdate(args),
      {
        get: (keyArgs) => this.get(keyArgs),
        keys: ['domainName', 'recordId'],
        toArgs: recordFieldsFromPayload,
      },
    );
  }

  /** Record types that can be created in zones of the given type. */
  getAvailableRecordTypes(args: { readonly zoneType?: string }): Promise<ApiResponse> {
    return this.ctx.run('record.getAvailableRecordTypes', () =>
      this.ctx.get('dns/get-available-record-types.json', this.ctx.parameters({ 'zone-type': args.zoneType })),
    );
  }

  getAvailableTtls(): Promise<ApiResponse> {
    return this.ctx.run('record.getAvailableTtls', () =>
      this.ctx.get('dns/get-available-ttl.json', this.ctx.parameters({})),
    );
  }

  /** Records of a zone, keyed by record id. */
  list(args: RecordListArgs): Promise<ApiResponse> {
    return this.ctx.run('record.list', () =>
      this.ctx.get(
        'dns/records.json',
        this.ctx.parameters({
          'domain-name': args.domainName,
          host: field(args.host, { optional: true }),
          type: field(args.recordType, { optional: true, validateAs: 'record-type' }),
        }),
      ),
    );
  }

  create(args: RecordCreateArgs): Promise<ApiResponse> {
    return this.ctx.run('record.create', () =>
      this.ctx.post('dns/add-record.json', this.ctx.parameters(buildRecordFields(args))),
    );
  }

  /** Import every record of the zone from another server. The zone must have the same name on both. */
  transfer(args: RecordTransferArgs): Promise<ApiResponse> {
    return this.ctx.run('record.transfer', () =>
      this.ctx.post(
        'dns/axfr-import.json',
        this.ctx.parameters({ 'domain-name': args.domainName, server: args.server }),
      ),
    );
  }

  copy(args: RecordCopyArgs): Promise<ApiResponse> {
    return this.ctx.run('record.copy', () =>
      this.ctx.post(
        'dns/copy-records.json',
        this.ctx.parameters({
          'domain-name': args.domainName,
          'from-domain': args.fromDomain,
          'delete-current-records': args.deleteCurrentRecords ? 1 : 0,
        }),
      ),
    );
  }

  /**
   * A single record, picked out of the zone listing. Resolves with a 404
   * failure when the zone has no record with that id.
   */
  get(args: RecordKeyArgs): Promise<ApiResponse> {
    return this.ctx.run('record.get', async () => {
      const recordId = String(validate('record-id', args.recordId));
      const listed = await this.list({ domainName: args.domainName });
      if (!listed.success) {
        return listed;
      }

      const record = isRecord(listed.payload) && Object.hasOwn(listed.payload, recordId)
        ? listed.payload[recordId]
        : undefined;
      if (record === undefined) {
        throw new RecordNotFoundError(`Record "${recordId}" not found in "${args.domainName ?? ''}" zone.`);
      }

      return { status: listed.statusCode ?? HTTP_OK, body: record };
    });
  }

  /** The zone in BIND format. */
  export(args: { readonly domainName?: string }): Promise<ApiResponse> {
    return this.ctx.run('record.export', () =>
      this.ctx.get('dns/records-export.json', this.ctx.parameters({ 'domain-name': args.domainName })),
    );
  }

  /** URL that points an A or AAAA record at whichever address calls it. */
  getDynamicUrl(args: RecordKeyArgs): Promise<ApiResponse> {
    return this.ctx.run('record.getDynamicUrl', () =>
      this.ctx.get('dns/get-dynamic-url.json', this.keyParameters(args)),
    );
  }

  /**
   * Modify a record. With `patch: true` the current record is fetched first
   * and only the fields given here change. Without `recordType` one extra
   * call looks it up.
   */
  update(args: Patchable<RecordUpdateArgs>): Promise<ApiResponse> {
    return this.ctx.run('record.update', () => this.patchableUpdate(args));
  }

  patch(args: RecordUpdateArgs): Promise<ApiResponse> {
    return this.update({ ...args, patch: true });
  }

  activate(args: RecordKeyArgs): Promise<ApiResponse> {
    return this.ctx.run('record.activate', () =>
      this.ctx.post('dns/change-record-status.json', this.keyParameters(args, 1)),
    );
  }

  deactivate(args: RecordKeyArgs): Promise<ApiResponse> {
    return this.ctx.run('record.deactivate', () =>
      this.ctx.post('dns/change-record-status.json', this.keyParameters(args, 0)),
    );
  }

  toggleActivation(args: RecordKeyArgs): Promise<ApiResponse> {
    return this.ctx.run('record.toggleActivation', () =>
      this.ctx.post('dns/change-record-status.json', this.keyParameters(args)),
    );
  }

  delete(args: RecordKeyArgs): Promise<ApiResponse> {
    return this.ctx.run('record.delete', () => this.ctx.post('dns/delete-record.json', this.keyParameters(args)));
  }

  private keyParameters(args: RecordKeyArgs, status?: 0 | 1) {
    return this.ctx.parameters({
      'domain-name': args.domainName,
      'record-id': args.recordId,
      ...(status !== undefined ? { status } : {}),
    });
  }

  private async sendUpdate(args: RecordUpdateArgs): Promise<EndpointOutcome> {
    let recordType = args.recordType;
    if (!recordType) {
      const current = await this.get({ domainName: args.domainName, recordId: args.recordId });
      if (!current.success) {
        return current;
      }
      recordType = isRecord(current.payload) ? readString(current.payload, 'type') : undefined;
    }

    const fields = { ...buildRecordFields({ ...args, recordType }), 'record-id': args.recordId };
    const params = this.ctx.parameters(fields).toMap();
    delete params['record-type'];

    return this.ctx.post('dns/mod-record.json', params);
  }
}
