export interface Position {
  offset: number;
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
}

export interface StringLiteral {
  kind: 'string';
  value: string;
  span: Span;
}

export interface NumberLiteral {
  kind: 'number';
  value: number;
  raw: string;
  span: Span;
}

export interface BooleanLiteral {
  kind: 'boolean';
  value: boolean;
  span: Span;
}

/** A bare identifier used as a value, e.g. `Cascade` or an enum member. */
export interface ConstantValue {
  kind: 'constant';
  value: string;
  span: Span;
}

export interface ArrayExpression {
  kind: 'array';
  items: Expression[];
  span: Span;
}

export interface FunctionCall {
  kind: 'function';
  name: string;
  arguments: Argument[];
  span: Span;
}

export type Expression =
  | StringLiteral
  | NumberLiteral
  | BooleanLiteral
  | ConstantValue
  | ArrayExpression
  | FunctionCall;

export interface Argument {
  name?: string;
  value: Expression;
  span: Span;
}

export interface Attribute {
  /** Dotted name without the leading `@`/`@@`, e.g. `id` or `db.VarChar`. */
  name: string;
  scope: 'field' | 'block';
  arguments: Argument[];
  span: Span;
}

export type FieldArity = 'required' | 'optional' | 'list';

export interface FieldType {
  name: string;
  arity: FieldArity;
  /** Raw database type of an `Unsupported("...")` field. */
  unsupported?: string;
  span: Span;
}

export interface FieldDeclaration {
  name: string;
  type: FieldType;
  attributes: Attribute[];
  documentation?: string;
  span: Span;
}

export interface EnumValue {
  name: string;
  attributes: Attribute[];
  documentation?: string;
  span: Span;
}

export interface ConfigProperty {
  key: string;
  value: Expression;
  span: Span;
}

export interface DatasourceBlock {
  kind: 'datasource';
  name: string;
  properties: ConfigProperty[];
  documentation?: string;
  span: Span;
}

export interface GeneratorBlock {
  kind: 'generator';
  name: string;
  properties: ConfigProperty[];
  documentation?: string;
  span: Span;
}

export interface ModelBlock {
  kind: 'model';
  name: string;
  fields: FieldDeclaration[];
  attributes: Attribute[];
  documentation?: string;
  span: Span;
}

export interface EnumBlock {
  kind: 'enum';
  name: string;
  values: EnumValue[];
  attributes: Attribute[];
  documentation?: string;
  span: Span;
}

export type Block = DatasourceBlock | GeneratorBlock | ModelBlock | EnumBlock;
export type ConfigBlock = DatasourceBlock | GeneratorBlock;

export interface SchemaDocument {
  blocks: Block[];
}

export function datasourcesOf(document: SchemaDocument): DatasourceBlock[] {
  return document.blocks.filter((b): b is DatasourceBlock => b.kind === 'datasource');
}

export function generatorsOf(document: SchemaDocument): GeneratorBlock[] {
  return document.blocks.filter((b): b is GeneratorBlock => b.kind === 'generator');
}

export function modelsOf(document: SchemaDocument): ModelBlock[] {
  return document.blocks.filter((b): b is ModelBlock => b.kind === 'model');
}

export function enumsOf(document: SchemaDocument): EnumBlock[] {
  return document.blocks.filter((b): b is EnumBlock => b.kind === 'enum');
}

export function findProperty(block: ConfigBlock, key: string): ConfigProperty | undefined {
  return block.properties.find((p) => p.key === key);
}
