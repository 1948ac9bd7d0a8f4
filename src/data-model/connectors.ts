export const PROVIDERS = [
  'postgresql',
  'mysql',
  'sqlite',
  'sqlserver',
  'mongodb',
  'cockroachdb',
] as const;

export type Provider = (typeof PROVIDERS)[number];

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((p) => p === value);
}

export const SCALAR_TYPES = [
  'String',
  'Boolean',
  'Int',
  'BigInt',
  'Float',
  'Decimal',
  'DateTime',
  'Json',
  'Bytes',
] as const;

export type ScalarType = (typeof SCALAR_TYPES)[number];

export function isScalarType(value: string): value is ScalarType {
  return SCALAR_TYPES.some((t) => t === value);
}

/** Connectors that store lists of scalars and enums natively. */
export const SCALAR_LIST_PROVIDERS: ReadonlySet<Provider> = new Set<Provider>([
  'postgresql',
  'cockroachdb',
  'mongodb',
]);

/** URL prefixes each connector accepts in a datasource `url`. */
export const URL_PROTOCOLS: Record<Provider, string[]> = {
  postgresql: ['postgresql://', 'postgres://'],
  cockroachdb: ['postgresql://', 'postgres://'],
  mysql: ['mysql://'],
  sqlite: ['file:'],
  sqlserver: ['sqlserver://'],
  mongodb: ['mongodb://', 'mongodb+srv://'],
};

/** Proxy URLs accepted regardless of the connector. */
export const PROXY_PROTOCOLS = ['prisma://', 'prisma+postgres://'];
