export const DnsRecordType = {
  A: 'A',
  AAAA: 'AAAA',
  MX: 'MX',
  CNAME: 'CNAME',
  TXT: 'TXT',
  SPF: 'SPF',
  NS: 'NS',
  SRV: 'SRV',
  WR: 'WR',
  RP: 'RP',
  SSHFP: 'SSHFP',
  ALIAS: 'ALIAS',
  CAA: 'CAA',
  NAPTR: 'NAPTR',
  PTR: 'PTR',
  TLSA: 'TLSA',
} as const;

export type DnsRecordType = (typeof DnsRecordType)[keyof typeof DnsRecordType];

/** Case-insensitive lookup. Returns the canonical upper-case type, or `null` when unknown. */
export function toDnsRecordType(value: unknown): DnsRecordType | null {
  if (typeof value !== 'string') return null;
  const upper = value.toUpperCase();
  for (const type of Object.values(DnsRecordType)) {
    if (type === upper) return type;
  }
  return null;
}
