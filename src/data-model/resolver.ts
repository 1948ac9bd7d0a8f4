import {
  Attribute,
  DatasourceBlock,
  EnumBlock,
  FieldDeclaration,
  ModelBlock,
  SchemaDocument,
  Span,
  datasourcesOf,
  enumsOf,
  findProperty,
  generatorsOf,
  modelsOf,
} from '../language/ast';
import {
  Diagnostic,
  SchemaValidationError,
  error,
  hasErrors,
  warning,
} from '../language/diagnostics';
import {
  attributeLabel,
  fieldList,
  findArgument,
  nativeTypeArguments,
  stringValue,
} from './attributes';
import {
  PROVIDERS,
  Provider,
  SCALAR_LIST_PROVIDERS,
  isProvider,
  isScalarType,
} from './connectors';
import {
  DataModel,
  FieldKind,
  IndexDefinition,
  ResolvedEnum,
  ResolvedField,
  ResolvedModel,
} from './data-model.types';
import { resolveDefault } from './defaults';
import { checkNativeType } from './native-types';
import { FieldContext, ModelContext, resolveRelations } from './relations';

export interface AnalysisResult {
  dataModel: DataModel;
  diagnostics: Diagnostic[];
}

interface DatasourceInfo {
  name: string;
  provider?: Provider;
}

/**
 * Validates a parsed document and resolves it into a data model, throwing a
 * SchemaValidationError when any error is found.
 */
export function resolveDataModel(document: SchemaDocument): DataModel {
  const { dataModel, diagnostics } = analyzeDataModel(document);
  if (hasErrors(diagnostics)) {
    throw new SchemaValidationError(diagnostics);
  }
  return dataModel;
}

/** Like resolveDataModel, but returns diagnostics instead of throwing. */
export function analyzeDataModel(document: SchemaDocument): AnalysisResult {
  return new DataModelResolver(document).run();
}

class DataModelResolver {
  private readonly diagnostics: Diagnostic[] = [];
  private readonly modelBlocks = new Map<string, ModelBlock>();
  private readonly enumBlocks = new Map<string, EnumBlock>();
  private datasource?: DatasourceInfo;

  constructor(private readonly document: SchemaDocument) {}

  run(): AnalysisResult {
    this.datasource = this.resolveDatasource();
    this.checkGenerators();
    this.collectNames();

    const enums = [...this.enumBlocks.values()].map((block) => this.resolveEnum(block));
    const contexts = new Map<string, ModelContext>();
    for (const block of this.modelBlocks.values()) {
      contexts.set(block.name, this.resolveModel(block));
    }
    const relations = resolveRelations(contexts, this.diagnostics);

    return {
      dataModel: {
        provider: this.datasource?.provider,
        models: [...contexts.values()].map((c) => c.model),
        enums,
        relations,
      },
      diagnostics: this.diagnostics,
    };
  }

  private resolveDatasource(): DatasourceInfo | undefined {
    const [first, ...rest] = datasourcesOf(this.document);
    if (!first) {
      this.diagnostics.push(
        warning(
          'W_NO_DATASOURCE',
          'No datasource block found. Connector-specific rules and native types are not checked.',
        ),
      );
      return undefined;
    }

    for (const extra of rest) {
      this.report('E_DUPLICATE_DATASOURCE', 'Only one datasource block is allowed.', extra);
    }

    return { name: first.name, provider: this.readProvider(first) };
  }

  private readProvider(block: DatasourceBlock): Provider | undefined {
    const property = findProperty(block, 'provider');
    if (!property) {
      this.report(
        'E_MISSING_PROVIDER',
        `The datasource "${block.name}" must define a "provider".`,
        block,
      );
      return undefined;
    }
    const value = stringValue(property.value);
    if (value === undefined) {
      this.report(
        'E_INVALID_PROVIDER',
        'The "provider" of a datasource must be a string literal.',
        property,
      );
      return undefined;
    }
    if (!isProvider(value)) {
      this.report(
        'E_INVALID_PROVIDER',
        `Datasource provider not known: "${value}". Expected one of: ${PROVIDERS.join(', ')}.`,
        property,
      );
      return undefined;
    }
    return value;
  }

  private checkGenerators(): void {
    const seen = new Set<string>();
    for (const block of generatorsOf(this.document)) {
      if (seen.has(block.name)) {
        this.report(
          'E_DUPLICATE_GENERATOR',
          `The generator "${block.name}" cannot be defined because a generator with that name already exists.`,
          block,
        );
      }
      seen.add(block.name);
    }
  }

  private collectNames(): void {
    const blocks: Array<ModelBlock | EnumBlock> = [
      ...modelsOf(this.document),
      ...enumsOf(this.document),
    ].sort((a, b) => a.span.start.offset - b.span.start.offset);

    for (const block of blocks) {
      if (isScalarType(block.name) || block.name === 'Unsupported') {
        this.report(
          'E_RESERVED_NAME',
          `The ${block.kind} name "${block.name}" is reserved for a built-in type.`,
          block,
        );
        continue;
      }

      const existing = this.modelBlocks.get(block.name) ?? this.enumBlocks.get(block.name);
      if (existing) {
        this.report(
          'E_DUPLICATE_NAME',
          `The ${block.kind} "${block.name}" cannot be defined because a ${existing.kind} with that name already exists.`,
          block,
        );
        continue;
      }

      if (block.kind === 'model') this.modelBlocks.set(block.name, block);
      else this.enumBlocks.set(block.name, block);
    }
  }

  private resolveEnum(block: EnumBlock): ResolvedEnum {
    const resolved: ResolvedEnum = {
      name: block.name,
      dbName: block.name,
      values: [],
      documentation: block.documentation,
    };

    if (block.values.length === 0) {
      this.report('E_EMPTY_ENUM', `The enum "${block.name}" must have at least one value.`, block);
    }

    const seen = new Set<string>();
    for (const value of block.values) {
      if (seen.has(value.name)) {
        this.report(
          'E_DUPLICATE_ENUM_VALUE',
          `Value "${value.name}" is already defined on enum "${block.name}".`,
          value,
        );
        continue;
      }
      seen.add(value.name);

      let dbName = value.name;
      for (const attribute of value.attributes) {
        if (attribute.name === 'map') {
          dbName = this.readMap(attribute) ?? dbName;
        } else {
          this.unknownAttribute(attribute);
        }
      }
      resolved.values.push({ name: value.name, dbName, documentation: value.documentation });
    }

    for (const attribute of block.attributes) {
      if (attribute.name === 'map') {
        resolved.dbName = this.readMap(attribute) ?? resolved.dbName;
      } else {
        this.unknownAttribute(attribute);
      }
    }

    return resolved;
  }

  private resolveModel(block: ModelBlock): ModelContext {
    const model: ResolvedModel = {
      name: block.name,
      dbName: block.name,
      fields: [],
      primaryKey: null,
      uniqueIndexes: [],
      indexes: [],
      isIgnored: false,
      documentation: block.documentation,
    };
    const context: ModelContext = { block, model, fields: new Map() };

    for (const declaration of block.fields) {
      if (context.fields.has(declaration.name)) {
        this.report(
          'E_DUPLICATE_FIELD',
          `Field "${declaration.name}" is already defined on model "${block.name}".`,
          declaration,
        );
        continue;
      }

      const fieldContext = this.resolveField(block, declaration);
      if (!fieldContext) continue;
      context.fields.set(declaration.name, fieldContext);
      model.fields.push(fieldContext.field);
    }

    this.resolveBlockAttributes(context);
    this.checkUniqueCriteria(context);
    return context;
  }

  private resolveField(
    block: ModelBlock,
    declaration: FieldDeclaration,
  ): FieldContext | undefined {
    const { type } = declaration;
    const kind = this.kindOf(type.name, type.unsupported !== undefined);
    if (!kind) {
      this.report(
        'E_UNKNOWN_TYPE',
        `Type "${type.name}" is neither a built-in type, nor refers to another model or enum.`,
        type,
      );
      return undefined;
    }

    const field: ResolvedField = {
      name: declaration.name,
      dbName: declaration.name,
      kind,
      type: type.name,
      isList: type.arity === 'list',
      isRequired: type.arity !== 'optional',
      isId: false,
      isUnique: false,
      isUpdatedAt: false,
      isReadOnly: false,
      isIgnored: false,
      documentation: declaration.documentation,
    };
    const context: FieldContext = { declaration, field };
    const provider = this.datasource?.provider;
    const label = `"${field.name}" in model "${block.name}"`;

    if (
      field.isList &&
      (kind === 'scalar' || kind === 'enum') &&
      provider &&
      !SCALAR_LIST_PROVIDERS.has(provider)
    ) {
      this.report(
        'E_SCALAR_LIST_UNSUPPORTED',
        `Field ${label} can't be a list. The current connector does not support lists of primitive types.`,
        declaration,
      );
    }

    const seen = new Set<string>();
    for (const attribute of declaration.attributes) {
      const isNative = attribute.name.includes('.');
      const slot = isNative ? 'native type' : attribute.name;
      if (seen.has(slot)) {
        this.report(
          'E_DUPLICATE_ATTRIBUTE',
          isNative
            ? `Field ${label} can only have one native type attribute.`
            : `Attribute "${attributeLabel(attribute)}" can only be defined once on field ${label}.`,
          attribute,
        );
        continue;
      }
      seen.add(slot);

      if (isNative) {
        this.resolveNativeType(field, attribute, label);
        continue;
      }

      switch (attribute.name) {
        case 'id':
          if (kind === 'object') {
            this.report('E_INVALID_ATTRIBUTE', `Relation field ${label} cannot be an @id.`, attribute);
          } else if (!field.isRequired) {
            this.report('E_INVALID_ATTRIBUTE', `Fields that are marked as id must be required: ${label}.`, attribute);
          } else if (field.isList) {
            this.report('E_INVALID_ATTRIBUTE', `Fields that are marked as id cannot be lists: ${label}.`, attribute);
          } else {
            field.isId = true;
          }
          break;
        case 'unique':
          if (kind === 'object') {
            this.report('E_INVALID_ATTRIBUTE', `Relation field ${label} cannot be @unique.`, attribute);
          } else {
            field.isUnique = true;
          }
          break;
        case 'default':
          if (kind === 'object') {
            this.report(
              'E_INVALID_ATTRIBUTE',
              `Cannot set a default value on the relation field ${label}.`,
              attribute,
            );
          } else {
            const argument = findArgument(attribute, 'value', 0);
            if (!argument) {
              this.report('E_INVALID_ATTRIBUTE', `@default on field ${label} needs a value.`, attribute);
            } else {
              field.default = resolveDefault(
                argument.value,
                {
                  model: block.name,
                  field: field.name,
                  kind,
                  type: field.type,
                  isList: field.isList,
                  isId: declaration.attributes.some((a) => a.name === 'id'),
                  provider,
                  enumValues: this.enumValuesOf(field),
                },
                this.diagnostics,
              );
            }
          }
          break;
        case 'updatedAt':
          if (field.type !== 'DateTime' || kind !== 'scalar') {
            this.report(
              'E_INVALID_ATTRIBUTE',
              `Fields that are marked with @updatedAt must be of type DateTime: ${label}.`,
              attribute,
            );
          } else {
            field.isUpdatedAt = true;
          }
          break;
        case 'map':
          field.dbName = this.readMap(attribute) ?? field.dbName;
          break;
        case 'relation':
          if (kind !== 'object') {
            this.report(
              'E_INVALID_ATTRIBUTE',
              `@relation can only be used on relation fields, but ${label} is of type ${field.type}.`,
              attribute,
            );
          } else {
            context.relationAttribute = attribute;
          }
          break;
        case 'ignore':
          field.isIgnored = true;
          break;
        default:
          this.unknownAttribute(attribute);
      }
    }

    return context;
  }

  private resolveNativeType(field: ResolvedField, attribute: Attribute, label: string): void {
    const [prefix, ...rest] = attribute.name.split('.');
    const typeName = rest.join('.');

    if (!this.datasource || prefix !== this.datasource.name) {
      const expected = this.datasource ? ` e.g. "${this.datasource.name}"` : '';
      this.report(
        'E_UNKNOWN_ATTRIBUTE',
        `The prefix "${prefix}" is invalid. It must be equal to the name of an existing datasource${expected}.`,
        attribute,
      );
      return;
    }
    if (field.kind !== 'scalar' || !isScalarType(field.type)) {
      this.report(
        'E_INVALID_NATIVE_TYPE',
        `Native types can only be used on scalar fields, but ${label} is of type ${field.type}.`,
        attribute,
      );
      return;
    }

    const args = nativeTypeArguments(attribute);
    const provider = this.datasource.provider;
    if (provider) {
      const problem = checkNativeType(provider, typeName, field.type, args.length);
      if (problem) {
        this.report('E_INVALID_NATIVE_TYPE', problem, attribute);
        return;
      }
    }
    field.nativeType = { name: typeName, args };
  }

  private resolveBlockAttributes(context: ModelContext): void {
    const { block, model } = context;
    const idField = model.fields.find((f) => f.isId);

    if (model.fields.filter((f) => f.isId).length > 1) {
      this.report(
        'E_MULTIPLE_IDS',
        `At most one field can be marked as @id on model "${block.name}". Use @@id for a compound id.`,
        block,
      );
    }
    if (idField) {
      model.primaryKey = { fields: [idField.name] };
    }

    for (const attribute of block.attributes) {
      switch (attribute.name) {
        case 'id': {
          if (idField) {
            this.report(
              'E_MULTIPLE_IDS',
              `Each model must have at most one id criteria. You can't have @id and @@id at the same time on model "${block.name}".`,
              attribute,
            );
            break;
          }
          const index = this.readIndex(context, attribute, true);
          if (index) model.primaryKey = index;
          break;
        }
        case 'unique': {
          const index = this.readIndex(context, attribute, false);
          if (index) model.uniqueIndexes.push(index);
          break;
        }
        case 'index': {
          const index = this.readIndex(context, attribute, false);
          if (index) model.indexes.push(index);
          break;
        }
        case 'map':
          model.dbName = this.readMap(attribute) ?? model.dbName;
          break;
        case 'ignore':
          model.isIgnored = true;
          break;
        default:
          this.unknownAttribute(attribute);
      }
    }
  }

  private readIndex(
    context: ModelContext,
    attribute: Attribute,
    requireRequired: boolean,
  ): IndexDefinition | undefined {
    const label = attributeLabel(attribute);
    const names = fieldList(findArgument(attribute, 'fields', 0)?.value);
    if (!names || names.length === 0) {
      this.report(
        'E_INVALID_ATTRIBUTE',
        `${label} on model "${context.block.name}" needs a non-empty list of fields.`,
        attribute,
      );
      return undefined;
    }

    let valid = true;
    for (const name of names) {
      const field = context.fields.get(name)?.field;
      if (!field) {
        valid = false;
        this.report(
          'E_INVALID_ATTRIBUTE',
          `${label} refers to the unknown field "${name}" on model "${context.block.name}".`,
          attribute,
        );
      } else if (field.kind === 'object') {
        valid = false;
        this.report(
          'E_INVALID_ATTRIBUTE',
          `${label} refers to the relation field "${name}" on model "${context.block.name}". Use its scalar fields instead.`,
          attribute,
        );
      } else if (requireRequired && !field.isRequired) {
        valid = false;
        this.report(
          'E_INVALID_ATTRIBUTE',
          `${label} refers to the optional field "${name}" on model "${context.block.name}". Id fields must be required.`,
          attribute,
        );
      }
    }
    if (!valid) return undefined;

    const index: IndexDefinition = { fields: names };
    const name = stringValue(findArgument(attribute, 'name')?.value);
    const map = stringValue(findArgument(attribute, 'map')?.value);
    if (name !== undefined) index.name = name;
    if (map !== undefined) index.map = map;
    return index;
  }

  private checkUniqueCriteria(context: ModelContext): void {
    const { model, block } = context;
    if (model.isIgnored || model.primaryKey) return;

    const isRequiredScalar = (name: string): boolean => {
      const field = context.fields.get(name)?.field;
      return field !== undefined && field.isRequired && !field.isList;
    };
    const hasUniqueField = model.fields.some((f) => f.isUnique && isRequiredScalar(f.name));
    const hasUniqueIndex = model.uniqueIndexes.some((i) => i.fields.every(isRequiredScalar));

    if (!hasUniqueField && !hasUniqueIndex) {
      this.report(
        'E_MISSING_UNIQUE_CRITERIA',
        `Each model must have at least one unique criteria that has only required fields. Either mark a single field with @id, @unique or add a multi field criterion with @@id([]) or @@unique([]) to the model "${block.name}".`,
        block,
      );
    }
  }

  private kindOf(typeName: string, unsupported: boolean): FieldKind | undefined {
    if (unsupported) return 'unsupported';
    if (isScalarType(typeName)) return 'scalar';
    if (this.enumBlocks.has(typeName)) return 'enum';
    if (this.modelBlocks.has(typeName)) return 'object';
    return undefined;
  }

  private enumValuesOf(field: ResolvedField): ReadonlySet<string> | undefined {
    if (field.kind !== 'enum') return undefined;
    const block = this.enumBlocks.get(field.type);
    return block ? new Set(block.values.map((v) => v.name)) : undefined;
  }

  private readMap(attribute: Attribute): string | undefined {
    const value = stringValue(findArgument(attribute, 'name', 0)?.value);
    if (value === undefined) {
      this.report(
        'E_INVALID_ATTRIBUTE',
        `${attributeLabel(attribute)} needs a string argument.`,
        attribute,
      );
    }
    return value;
  }

  private unknownAttribute(attribute: Attribute): void {
    this.report(
      'E_UNKNOWN_ATTRIBUTE',
      `Attribute not known: "${attributeLabel(attribute)}".`,
      attribute,
    );
  }

  private report(code: string, message: string, node?: { span: Span }): void {
    this.diagnostics.push(error(code, message, node?.span));
  }
}
