import { Provider, ScalarType } from './connectors';

export type FieldKind = 'scalar' | 'enum' | 'object' | 'unsupported';

export const REFERENTIAL_ACTIONS = [
  'Cascade',
  'Restrict',
  'NoAction',
  'SetNull',
  'SetDefault',
] as const;

export type ReferentialAction = (typeof REFERENTIAL_ACTIONS)[number];

export type LiteralValue = string | number | boolean;

export type DefaultValue =
  | { kind: 'literal'; value: LiteralValue }
  | { kind: 'function'; name: string; args: Array<string | number> }
  | { kind: 'enum'; value: string }
  | { kind: 'list'; values: LiteralValue[] };

export interface NativeType {
  name: string;
  args: string[];
}

export interface FieldRelation {
  name: string;
  /** Scalar fields of this model holding the foreign key; empty on the back side. */
  fields: string[];
  references: string[];
  onDelete?: ReferentialAction;
  onUpdate?: ReferentialAction;
}

export interface ResolvedField {
  name: string;
  dbName: string;
  kind: FieldKind;
  /** Scalar, enum or model name; `Unsupported` for unsupported fields. */
  type: string;
  isList: boolean;
  isRequired: boolean;
  isId: boolean;
  isUnique: boolean;
  isUpdatedAt: boolean;
  /** Set on scalars that back a relation's `fields`. */
  isReadOnly: boolean;
  isIgnored: boolean;
  default?: DefaultValue;
  nativeType?: NativeType;
  relation?: FieldRelation;
  documentation?: string;
}

export interface IndexDefinition {
  name?: string;
  map?: string;
  fields: string[];
}

export interface ResolvedModel {
  name: string;
  dbName: string;
  fields: ResolvedField[];
  primaryKey: IndexDefinition | null;
  uniqueIndexes: IndexDefinition[];
  indexes: IndexDefinition[];
  isIgnored: boolean;
  documentation?: string;
}

export interface ResolvedEnumValue {
  name: string;
  dbName: string;
  documentation?: string;
}

export interface ResolvedEnum {
  name: string;
  dbName: string;
  values: ResolvedEnumValue[];
  documentation?: string;
}

export type RelationKind = 'one-to-one' | 'one-to-many' | 'many-to-many';

export interface RelationEndpoint {
  model: string;
  field: string;
}

export interface ResolvedRelation {
  name: string;
  kind: RelationKind;
  /** Side holding `fields`; for many-to-many the alphabetically first side. */
  from: RelationEndpoint;
  to: RelationEndpoint;
  fields: string[];
  references: string[];
  onDelete?: ReferentialAction;
  onUpdate?: ReferentialAction;
}

export interface DataModel {
  provider?: Provider;
  models: ResolvedModel[];
  enums: ResolvedEnum[];
  relations: ResolvedRelation[];
}
