export const ZoneType = {
  MASTER: 'master',
  SLAVE: 'slave',
  PARKED: 'parked',
  GEODNS: 'geodns',
  DOMAIN: 'domain',
  REVERSE: 'reverse',
} as const;

export type ZoneType = (typeof ZoneType)[keyof typeof ZoneType];

const ZONE_TYPES: ReadonlySet<string> = new Set(Object.values(ZoneType));

export function isZoneType(value: unknown): boolean {
  return typeof value === 'string' && ZONE_TYPES.has(value.toLowerCase());
}
