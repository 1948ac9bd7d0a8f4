import { ResolvedGenerator } from '../environment/configuration';
import {
  DataModel,
  ResolvedEnum,
  ResolvedField,
  ResolvedModel,
} from '../data-model/data-model.types';

/**
 * `runtime` types match values in memory (Date, Uint8Array); `json` types
 * match their JSON-serialized form.
 */
export type TypeTarget = 'runtime' | 'json';

export type ValidationOutput = 'zod' | 'none';

export interface GenerateOptions {
  target?: TypeTarget;
  validation?: ValidationOutput;
}

export interface GeneratorSettings extends Required<GenerateOptions> {
  output: string;
}

export interface GeneratedFile {
  path: string;
  content: string;
}

export const DEFAULT_OUTPUT = 'generated';

/**
 * Converts PascalCase or camelCase to kebab-case
 */
export function toKebabCase(str: string): string {
  return str
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1-$2')
    .replace(/[\s_]+/g, '-')
    .toLowerCase();
}

/**
 * Assigns each model a file name. Names that kebab-case to the same text,
 * such as `ABTest` and `AbTest`, get `-2`, `-3`... in model order.
 */
export function modelFileNames(models: ResolvedModel[]): Map<string, string> {
  const taken = new Set<string>();
  const names = new Map<string, string>();
  models.forEach((model) => {
    const base = toKebabCase(model.name);
    let name = base;
    for (let n = 2; taken.has(name); n++) name = `${base}-${n}`;
    taken.add(name);
    names.set(model.name, name);
  });
  return names;
}

function fileName(fileNames: ReadonlyMap<string, string>, modelName: string): string {
  return fileNames.get(modelName) ?? toKebabCase(modelName);
}

/**
 * Maps schema types to TypeScript types. Enum and model names map to
 * themselves.
 */
export function mapType(schemaType: string, target: TypeTarget = 'runtime'): string {
  switch (schemaType) {
    case 'String':
      return 'string';
    case 'Int':
    case 'Float':
    case 'Decimal':
      return 'number';
    case 'BigInt':
      return 'bigint';
    case 'Boolean':
      return 'boolean';
    case 'DateTime':
      return target === 'json' ? 'string' : 'Date';
    case 'Json':
      return target === 'json' ? 'Record<string, unknown>' : 'unknown';
    case 'Bytes':
      return target === 'json' ? 'string' : 'Uint8Array';
    case 'Unsupported':
      return 'unknown';
    default:
      return schemaType;
  }
}

/** Reads generator options from a resolved generator block. */
export function generatorSettings(generator: ResolvedGenerator): GeneratorSettings {
  return {
    output: generator.output ?? DEFAULT_OUTPUT,
    target: generator.config.target === 'json' ? 'json' : 'runtime',
    validation: generator.config.validation === 'zod' ? 'zod' : 'none',
  };
}

/**
 * Generates TypeScript sources for a data model: enums, one interface per
 * model, optional zod create schemas and a barrel file.
 */
export function generateClientTypes(
  dataModel: DataModel,
  options: GenerateOptions = {},
): GeneratedFile[] {
  const target = options.target ?? 'runtime';
  const models = dataModel.models.filter((m) => !m.isIgnored);
  const fileNames = modelFileNames(models);
  const files: GeneratedFile[] = [];
  const exports: string[] = [];

  if (dataModel.enums.length > 0) {
    files.push({ path: 'enums.ts', content: generateEnumsContent(dataModel.enums) });
    exports.push('./enums');
  }

  models.forEach((model) => {
    const path = `models/${fileName(fileNames, model.name)}`;
    files.push({
      path: `${path}.ts`,
      content: generateInterfaceContent(model, fileNames, target),
    });
    exports.push(`./${path}`);
  });

  if (options.validation === 'zod') {
    models.forEach((model) => {
      const path = `schemas/${fileName(fileNames, model.name)}.schema`;
      files.push({ path: `${path}.ts`, content: generateCreateSchemaContent(model, target) });
      exports.push(`./${path}`);
    });
  }

  files.push({
    path: 'index.ts',
    content: exports.map((e) => `export * from '${e}';\n`).join(''),
  });
  return files;
}

/**
 * Generates content for all enums in a single file
 */
export function generateEnumsContent(enums: ResolvedEnum[]): string {
  let content = '';
  enums.forEach((e, index) => {
    content += docComment(e.documentation, '');
    content += `export const ${e.name} = {\n`;
    e.values.forEach((v) => {
      content += `  ${v.name}: '${v.name}',\n`;
    });
    content += `} as const;\n\n`;
    content += `export type ${e.name} = (typeof ${e.name})[keyof typeof ${e.name}];\n`;

    if (index < enums.length - 1) {
      content += '\n';
    }
  });
  return content;
}

/**
 * Generates an interface for a model. Relation fields pointing at ignored
 * models are left out together with ignored fields.
 */
export function generateInterfaceContent(
  model: ResolvedModel,
  fileNames: ReadonlyMap<string, string>,
  target: TypeTarget = 'runtime',
): string {
  const fields = model.fields.filter(
    (f) => !f.isIgnored && (f.kind !== 'object' || fileNames.has(f.type)),
  );
  const importLines = new Set<string>();

  fields.forEach((f) => {
    if (f.kind === 'enum') {
      importLines.add(`import { ${f.type} } from '../enums';`);
    } else if (f.kind === 'object' && f.type !== model.name) {
      importLines.add(`import { ${f.type} } from './${fileName(fileNames, f.type)}';`);
    }
  });

  let content = '';
  const imports = Array.from(importLines).sort().join('\n');
  if (imports) content += imports + '\n\n';

  content += docComment(model.documentation, '');
  content += `export interface ${model.name} {\n`;
  fields.forEach((f) => {
    const suffix = f.isRequired ? '' : '?';
    const arraySuffix = f.isList ? '[]' : '';
    content += docComment(f.documentation, '  ');
    content += `  ${f.name}${suffix}: ${mapType(f.type, target)}${arraySuffix};\n`;
  });
  content += `}\n`;
  return content;
}

/**
 * Generates a zod schema for the input that creates a record. Generated ids,
 * `@updatedAt` fields, relation fields and foreign keys are left to the
 * database and the relation API.
 */
export function generateCreateSchemaContent(
  model: ResolvedModel,
  target: TypeTarget = 'runtime',
): string {
  const fields = model.fields.filter(
    (f) =>
      !f.isIgnored &&
      !f.isUpdatedAt &&
      !f.isReadOnly &&
      (f.kind === 'scalar' || f.kind === 'enum') &&
      !(f.isId && f.default),
  );
  const enums = [...new Set(fields.filter((f) => f.kind === 'enum').map((f) => f.type))].sort();

  let schemaFields = '';
  fields.forEach((f) => {
    let zodType = zodTypeFor(f, target);
    if (f.isList) {
      zodType = `z.array(${zodType})`;
    }
    if (!f.isRequired || f.default) {
      zodType += '.optional()';
    }
    schemaFields += `  ${f.name}: ${zodType},\n`;
  });

  let imports = "import { z } from 'zod';\n";
  if (enums.length > 0) {
    imports += `\nimport { ${enums.join(', ')} } from '../enums';\n`;
  }

  return `${imports}
export const Create${model.name}Schema = z.object({\n${schemaFields}});

export type Create${model.name}Input = z.infer<typeof Create${model.name}Schema>;
`;
}

function zodTypeFor(field: ResolvedField, target: TypeTarget): string {
  if (field.kind === 'enum') {
    return `z.enum(${field.type})`;
  }

  switch (field.type) {
    case 'String':
      return 'z.string()';
    case 'Int':
      return 'z.number().int()';
    case 'BigInt':
      return target === 'json' ? 'z.coerce.bigint()' : 'z.bigint()';
    case 'Float':
    case 'Decimal':
      return 'z.number()';
    case 'Boolean':
      return 'z.boolean()';
    case 'DateTime':
      return target === 'json' ? 'z.iso.datetime()' : 'z.coerce.date()';
    case 'Json':
      return target === 'json' ? 'z.record(z.string(), z.unknown())' : 'z.unknown()';
    case 'Bytes':
      return target === 'json' ? 'z.base64()' : 'z.instanceof(Uint8Array)';
    default:
      return 'z.unknown()';
  }
}

function docComment(documentation: string | undefined, indent: string): string {
  if (!documentation) return '';
  const lines = documentation.split('\n');
  if (lines.length === 1) return `${indent}/** ${lines[0]} */\n`;
  return `${indent}/**\n${lines.map((l) => `${indent} * ${l}`.trimEnd()).join('\n')}\n${indent} */\n`;
}
