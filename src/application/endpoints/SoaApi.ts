import type { ApiResponse } from '../../domain/model/ApiResponse.js';
import type { ApiContext } from '../ApiContext.js';
import type { EndpointOutcome } from '../invokeEndpoint.js';
import type { Patchable } from '../patchUpdate.js';
import { field } from '../../domain/model/FieldDefinition.js';
import { isRecord, readScalar, readString } from '../../domain/services/payload.js';
import { withPatchUpdate } from '../patchUpdate.js';

type Seconds = number | string;

export interface SoaUpdateArgs {
  readonly domainName?: string;
  /** Host name of the primary name server. */
  readonly primaryNs?: string;
  readonly adminMail?: string;
  /** 1200–43200 seconds. */
  readonly refresh?: Seconds;
  /** 180–2419200 seconds. */
  readonly retry?: Seconds;
  /** 1209600–2419200 seconds. */
  readonly expire?: Seconds;
  /** 60–2419200 seconds. */
  readonly defaultTtl?: Seconds;
}

function soaFieldsFromPayload(payload: unknown): Partial<SoaUpdateArgs> {
  if (!isRecord(payload)) return {};
  return {
    primaryNs: readString(payload, 'primary_ns'),
    adminMail: readString(payload, 'admin_mail'),
    refresh: readScalar(payload, 'refresh'),
    retry: readScalar(payload, 'retry'),
    expire: readScalar(payload, 'expire'),
    defaultTtl: readScalar(payload, 'default_ttl'),
  };
}

/** Start-of-authority record of a zone. */
export class SoaApi {
  private readonly patchableUpdate: (args: Patchable<SoaUpdateArgs>) => Promise<EndpointOutcome>;

  constructor(private readonly ctx: ApiContext) {
    this.patchableUpdate = withPatchUpdate<SoaUpdateArgs, 'domainName'>((args) => this.sendUpdate(args), {
      get: (keyArgs) => this.get(keyArgs),
      keys: ['domainName'],
      toArgs: soaFieldsFromPayload,
    });
  }

  get(args: { readonly domainName?: string }): Promise<ApiResponse> {
    return this.ctx.run('soa.get', () =>
      this.ctx.get('dns/soa-details.json', this.ctx.parameters({ 'domain-name': args.domainName })),
    );
  }

  update(args: Patchable<SoaUpdateArgs>): Promise<ApiResponse> {
    return this.ctx.run('soa.update', () => this.patchableUpdate(args));
  }

  patch(args: SoaUpdateArgs): Promise<ApiResponse> {
    return this.update({ ...args, patch: true });
  }

  private sendUpdate(args: SoaUpdateArgs): Promise<EndpointOutcome> {
    return this.ctx.post(
      'dns/modify-soa.json',
      this.ctx.parameters({
        'domain-name': args.domainName,
        'primary-ns': args.primaryNs,
        'admin-mail': args.adminMail,
        refresh: field(args.refresh, { minValue: 1200, maxValue: 43200 }),
        retry: field(args.retry, { minValue: 180, maxValue: 2419200 }),
        expire: field(args.expire, { minValue: 1209600, maxValue: 2419200 }),
        'default-ttl': field(args.defaultTtl, { minValue: 60, maxValue: 2419200 }),
      }),
    );
  }
}
