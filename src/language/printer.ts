import {
  Argument,
  Attribute,
  Block,
  ConfigBlock,
  EnumBlock,
  Expression,
  FieldType,
  ModelBlock,
  SchemaDocument,
} from './ast';

const INDENT = '  ';

/**
 * Renders a document in canonical layout: two-space indentation, aligned
 * columns inside each block and one blank line between blocks.
 */
export function printSchema(document: SchemaDocument): string {
  return document.blocks.map(printBlock).join('\n\n') + '\n';
}

export function printBlock(block: Block): string {
  switch (block.kind) {
    case 'datasource':
    case 'generator':
      return printConfigBlock(block);
    case 'model':
      return printModel(block);
    case 'enum':
      return printEnum(block);
  }
}

export function printExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'string':
      return quote(expression.value);
    case 'number':
      return expression.raw;
    case 'boolean':
      return String(expression.value);
    case 'constant':
      return expression.value;
    case 'array':
      return `[${expression.items.map(printExpression).join(', ')}]`;
    case 'function':
      return `${expression.name}(${expression.arguments.map(printArgument).join(', ')})`;
  }
}

export function printAttribute(attribute: Attribute): string {
  const marker = attribute.scope === 'block' ? '@@' : '@';
  const args =
    attribute.arguments.length > 0 ? `(${attribute.arguments.map(printArgument).join(', ')})` : '';
  return `${marker}${attribute.name}${args}`;
}

function printArgument(argument: Argument): string {
  const value = printExpression(argument.value);
  return argument.name ? `${argument.name}: ${value}` : value;
}

function printFieldType(type: FieldType): string {
  const base = type.unsupported !== undefined ? `Unsupported(${quote(type.unsupported)})` : type.name;
  if (type.arity === 'list') return `${base}[]`;
  if (type.arity === 'optional') return `${base}?`;
  return base;
}

function printDocs(documentation: string | undefined, indent: string): string[] {
  if (documentation === undefined) return [];
  return documentation.split('\n').map((line) => `${indent}///${line ? ` ${line}` : ''}`);
}

function printConfigBlock(block: ConfigBlock): string {
  const keyWidth = Math.max(0, ...block.properties.map((p) => p.key.length));
  const lines = [
    ...printDocs(block.documentation, ''),
    `${block.kind} ${block.name} {`,
    ...block.properties.map(
      (p) => `${INDENT}${p.key.padEnd(keyWidth)} = ${printExpression(p.value)}`,
    ),
    '}',
  ];
  return lines.join('\n');
}

function printModel(block: ModelBlock): string {
  const rows = block.fields.map((field) => ({
    docs: field.documentation,
    cells: [field.name, printFieldType(field.type), field.attributes.map(printAttribute).join(' ')],
  }));

  const lines = [
    ...printDocs(block.documentation, ''),
    `model ${block.name} {`,
    ...alignRows(rows),
  ];

  if (block.attributes.length > 0) {
    if (block.fields.length > 0) lines.push('');
    lines.push(...block.attributes.map((a) => `${INDENT}${printAttribute(a)}`));
  }

  lines.push('}');
  return lines.join('\n');
}

function printEnum(block: EnumBlock): string {
  const rows = block.values.map((value) => ({
    docs: value.documentation,
    cells: [value.name, value.attributes.map(printAttribute).join(' ')],
  }));

  const lines = [...printDocs(block.documentation, ''), `enum ${block.name} {`, ...alignRows(rows)];

  if (block.attributes.length > 0) {
    if (block.values.length > 0) lines.push('');
    lines.push(...block.attributes.map((a) => `${INDENT}${printAttribute(a)}`));
  }

  lines.push('}');
  return lines.join('\n');
}

interface Row {
  docs?: string;
  cells: string[];
}

function alignRows(rows: Row[]): string[] {
  const columnCount = Math.max(0, ...rows.map((r) => r.cells.length));
  const widths: number[] = [];
  for (let column = 0; column < columnCount; column++) {
    widths.push(Math.max(0, ...rows.map((r) => (r.cells[column] ?? '').length)));
  }

  return rows.flatMap((row) => {
    const cells = [...row.cells];
    while (cells.length > 0 && cells[cells.length - 1] === '') cells.pop();
    const line = cells
      .map((cell, column) => (column < cells.length - 1 ? cell.padEnd(widths[column]) : cell))
      .join(' ');
    return [...printDocs(row.docs, INDENT), `${INDENT}${line}`];
  });
}

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}
