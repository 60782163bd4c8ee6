import type { ApiResponse } from '../../domain/model/ApiResponse.js';
import type { Field, ParameterFields } from '../../domain/model/FieldDefinition.js';
import type { ApiContext } from '../ApiContext.js';
import { field } from '../../domain/model/FieldDefinition.js';
import { ZoneType } from '../../domain/model/ZoneType.js';

export interface ZoneListArgs {
  readonly page?: number | string;
  /** 10, 20, 30, 50 or 100. */
  readonly rowsPerPage?: number | string;
  /** Matches domain names, reverse zone names and other zone keywords. */
  readonly search?: string;
  /** Limit results to zones inside this group. */
  readonly groupId?: number | string;
}

export type ZonePageCountArgs = Omit<ZoneListArgs, 'page'>;

export interface ZoneCreateArgs {
  readonly domainName?: string;
  /** Default: `master`. */
  readonly zoneType?: string;
  /** Name servers for the initial NS records. Master zones only. */
  readonly ns?: readonly string[];
  /** Required for slave zones. */
  readonly masterIp?: string;
}

export interface ZoneArgs {
  readonly domainName?: string;
}

function searchFields(args: ZonePageCountArgs): ParameterFields {
  return {
    'rows-per-page': args.rowsPerPage ?? 10,
    search: field(args.search, { optional: true }),
    'group-id': field(args.groupId, { optional: true }),
  };
}

function isZoneKind(value: string | undefined, kind: ZoneType): boolean {
  return value !== undefined && value.toLowerCase() === kind;
}

/** DNS zone management: listing, registration, activation and DNSSEC. */
export class ZoneApi {
  constructor(private readonly ctx: ApiContext) {}

  /** Paginated list of zones. */
  list(args: ZoneListArgs = {}): Promise<ApiResponse> {
    return this.ctx.run('zone.list', () =>
      this.ctx.get(
        'dns/list-zones.json',
        this.ctx.parameters({ page: field(args.page ?? 1, { minValue: 1 }), ...searchFields(args) }),
      ),
    );
  }

  /** Number of pages for the full listing or a search listing. */
  getPageCount(args: ZonePageCountArgs = {}): Promise<ApiResponse> {
    return this.ctx.run('zone.getPageCount', () =>
      this.ctx.get('dns/get-pages-count.json', this.ctx.parameters(searchFields(args))),
    );
  }

  /**
   * Register a new zone. `ns` is only sent for master zones and `masterIp`
   * only (and always) for slave zones.
   */
  create(args: ZoneCreateArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.create', () => {
      const zoneType = args.zoneType ?? ZoneType.MASTER;
      const fields: Record<string, Field> = {
        'domain-name': args.domainName,
        'zone-type': zoneType,
      };

      if (isZoneKind(zoneType, ZoneType.SLAVE)) {
        fields['master-ip'] = args.masterIp;
      }
      if (isZoneKind(zoneType, ZoneType.MASTER)) {
        fields['ns'] = field(args.ns ?? [], { optional: true });
      }

      return this.ctx.post('dns/register.json', this.ctx.parameters(fields));
    });
  }

  get(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.get', () => this.ctx.get('dns/get-zone-info.json', this.domainParameters(args)));
  }

  /** Bump the zone's serial number. */
  update(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.update', () => this.ctx.post('dns/update-zone.json', this.domainParameters(args)));
  }

  activate(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.activate', () =>
      this.ctx.post('dns/change-status.json', this.domainParameters(args, { status: 1 })),
    );
  }

  deactivate(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.deactivate', () =>
      this.ctx.post('dns/change-status.json', this.domainParameters(args, { status: 0 })),
    );
  }

  toggleActivation(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.toggleActivation', () =>
      this.ctx.post('dns/change-status.json', this.domainParameters(args)),
    );
  }

  delete(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.delete', () => this.ctx.post('dns/delete.json', this.domainParameters(args)));
  }

  /** Zone count and the limits of the current plan. */
  getStats(): Promise<ApiResponse> {
    return this.ctx.run('zone.getStats', () => this.ctx.get('dns/get-zones-stats.json', this.ctx.parameters({})));
  }

  isDnssecAvailable(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.isDnssecAvailable', () =>
      this.ctx.get('dns/is-dnssec-available.json', this.domainParameters(args)),
    );
  }

  activateDnssec(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.activateDnssec', () =>
      this.ctx.post('dns/activate-dnssec.json', this.domainParameters(args)),
    );
  }

  deactivateDnssec(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.deactivateDnssec', () =>
      this.ctx.post('dns/deactivate-dnssec.json', this.domainParameters(args)),
    );
  }

  getDnssecDsRecords(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.getDnssecDsRecords', () =>
      this.ctx.get('dns/get-dnssec-ds-records.json', this.domainParameters(args)),
    );
  }

  /** Whether the zone has propagated to every name server. */
  isUpdated(args: ZoneArgs): Promise<ApiResponse> {
    return this.ctx.run('zone.isUpdated', () => this.ctx.get('dns/is-updated.json', this.domainParameters(args)));
  }

  private domainParameters(args: ZoneArgs, extra: ParameterFields = {}) {
    return this.ctx.parameters({ 'domain-name': args.domainName, ...extra });
  }
}
