import { Attribute, FieldDeclaration, ModelBlock, Span } from '../language/ast';
import { Diagnostic, error, warning } from '../language/diagnostics';
import { fieldList, stringValue } from './attributes';
import {
  REFERENTIAL_ACTIONS,
  ReferentialAction,
  RelationKind,
  ResolvedField,
  ResolvedModel,
  ResolvedRelation,
} from './data-model.types';

export interface FieldContext {
  declaration: FieldDeclaration;
  field: ResolvedField;
  relationAttribute?: Attribute;
}

export interface ModelContext {
  block: ModelBlock;
  model: ResolvedModel;
  fields: Map<string, FieldContext>;
}

interface RelationArguments {
  name?: string;
  fields?: string[];
  references?: string[];
  onDelete?: ReferentialAction;
  onUpdate?: ReferentialAction;
}

interface RelationSide {
  owner: ModelContext;
  context: FieldContext;
  args: RelationArguments;
  name: string;
}

/** UTF-16 code unit order, the order of `Array.prototype.sort` without a comparator. */
export const compareCodePoints = (x: string, y: string): number => (x < y ? -1 : x > y ? 1 : 0);

const isReferentialAction = (value: string): value is ReferentialAction =>
  REFERENTIAL_ACTIONS.some((a) => a === value);

/** Default relation name: both model names sorted and joined with `To`. */
export function defaultRelationName(modelA: string, modelB: string): string {
  const [first, second] = [modelA, modelB].sort(compareCodePoints);
  return `${first}To${second}`;
}

/**
 * Checks whether `names` form a unique criterion of the model: its primary
 * key, a single `@unique` field, or a `@@unique` field set.
 */
export function isUniqueCriterion(model: ResolvedModel, names: string[]): boolean {
  const sameSet = (other: string[]): boolean =>
    other.length === names.length && other.every((n) => names.includes(n));

  if (model.primaryKey && sameSet(model.primaryKey.fields)) return true;
  if (names.length === 1) {
    const field = model.fields.find((f) => f.name === names[0]);
    if (field && (field.isUnique || field.isId)) return true;
  }
  return model.uniqueIndexes.some((index) => sameSet(index.fields));
}

/**
 * Pairs relation fields, validates each relation and fills in relation
 * metadata on the resolved fields.
 */
export function resolveRelations(
  models: Map<string, ModelContext>,
  diagnostics: Diagnostic[],
): ResolvedRelation[] {
  return new RelationResolver(models, diagnostics).run();
}

class RelationResolver {
  private readonly sides = new Map<FieldContext, RelationSide>();
  private readonly paired = new Set<FieldContext>();
  private readonly reportedAmbiguities = new Set<string>();
  private readonly relations: ResolvedRelation[] = [];

  constructor(
    private readonly models: Map<string, ModelContext>,
    private readonly diagnostics: Diagnostic[],
  ) {}

  run(): ResolvedRelation[] {
    for (const owner of this.models.values()) {
      for (const context of owner.fields.values()) {
        if (context.field.kind !== 'object') continue;
        const args = context.relationAttribute
          ? this.parseArguments(context.relationAttribute)
          : {};
        const name = args.name ?? defaultRelationName(owner.model.name, context.field.type);
        this.sides.set(context, { owner, context, args, name });
        context.field.relation = {
          name,
          fields: args.fields ?? [],
          references: args.references ?? [],
        };
      }
    }

    for (const side of this.sides.values()) {
      if (this.paired.has(side.context)) continue;
      const opposite = this.findOpposite(side);
      if (!opposite) continue;
      this.paired.add(side.context);
      this.paired.add(opposite.context);
      this.resolvePair(side, opposite);
    }

    return this.relations;
  }

  private parseArguments(attribute: Attribute): RelationArguments {
    const args: RelationArguments = {};

    attribute.arguments.forEach((argument, index) => {
      const { value } = argument;
      const key = argument.name ?? (index === 0 ? 'name' : undefined);

      switch (key) {
        case 'name': {
          const name = stringValue(value);
          if (name === undefined) {
            this.report('E_INVALID_RELATION', 'The relation name must be a string.', value.span);
          } else {
            args.name = name;
          }
          break;
        }
        case 'fields':
        case 'references': {
          const names = fieldList(value);
          if (!names) {
            this.report(
              'E_INVALID_RELATION',
              `The "${key}" argument must be a list of field names.`,
              value.span,
            );
          } else {
            args[key] = names;
          }
          break;
        }
        case 'onDelete':
        case 'onUpdate': {
          if (value.kind === 'constant' && isReferentialAction(value.value)) {
            args[key] = value.value;
          } else {
            this.report(
              'E_INVALID_REFERENTIAL_ACTION',
              `Invalid referential action for "${key}". Allowed values: (${REFERENTIAL_ACTIONS.join(', ')}).`,
              value.span,
            );
          }
          break;
        }
        case 'map':
          if (stringValue(value) === undefined) {
            this.report('E_INVALID_RELATION', 'The "map" argument must be a string.', value.span);
          }
          break;
        default:
          this.report(
            'E_INVALID_RELATION',
            argument.name
              ? `Argument "${argument.name}" is not known in @relation.`
              : 'Only the relation name may be passed as a positional argument to @relation.',
            argument.span,
          );
      }
    });

    return args;
  }

  private findOpposite(side: RelationSide): RelationSide | undefined {
    const { owner, context, name } = side;
    const target = this.models.get(context.field.type);
    if (!target) return undefined;

    const sameDirection = [...this.sides.values()].filter(
      (s) => s.owner === owner && s.context.field.type === target.model.name && s.name === name,
    );
    const isSelf = target === owner;

    // Self relations hold both sides in one model, so up to two fields share a name.
    if (sameDirection.length > (isSelf ? 2 : 1)) {
      this.reportAmbiguity(owner, target, name, sameDirection);
      return undefined;
    }

    const candidates = [...this.sides.values()].filter(
      (s) =>
        s.owner === target &&
        s.context !== context &&
        s.context.field.type === owner.model.name &&
        s.name === name,
    );

    if (candidates.length === 0) {
      this.report(
        'E_MISSING_OPPOSITE_RELATION',
        `The relation field "${context.field.name}" on model "${owner.model.name}" is missing an opposite relation field on the model "${target.model.name}". Add a field of type "${owner.model.name}" to model "${target.model.name}".`,
        context.declaration.span,
      );
      return undefined;
    }
    if (candidates.length > 1) {
      this.reportAmbiguity(target, owner, name, candidates);
      return undefined;
    }
    return candidates[0];
  }

  private reportAmbiguity(
    owner: ModelContext,
    target: ModelContext,
    name: string,
    sides: RelationSide[],
  ): void {
    const key = `${owner.model.name}.${target.model.name}.${name}`;
    if (this.reportedAmbiguities.has(key)) return;
    this.reportedAmbiguities.add(key);
    const [first, second] = sides.map((s) => s.context.field.name);
    this.report(
      'E_AMBIGUOUS_RELATION',
      `Ambiguous relation detected. The fields "${first}" and "${second}" in model "${owner.model.name}" both refer to "${target.model.name}". Please provide different relation names for them by adding @relation(<name>).`,
      sides[0].context.declaration.span,
    );
  }

  private resolvePair(a: RelationSide, b: RelationSide): void {
    const aList = a.context.field.isList;
    const bList = b.context.field.isList;

    if (aList && bList) {
      this.resolveManyToMany(a, b);
      return;
    }

    if (aList || bList) {
      const [listSide, singleSide] = aList ? [a, b] : [b, a];
      if (definesKeys(listSide)) {
        this.report(
          'E_INVALID_RELATION',
          `The relation field "${listSide.context.field.name}" on model "${listSide.owner.model.name}" must not specify the "fields" or "references" argument. You must only specify it on the opposite field "${singleSide.context.field.name}" on model "${singleSide.owner.model.name}".`,
          listSide.context.declaration.span,
        );
      }
      this.resolveDefiningSide(singleSide, listSide, 'one-to-many');
      return;
    }

    const aDefines = definesKeys(a);
    const bDefines = definesKeys(b);
    if (aDefines && bDefines) {
      this.report(
        'E_INVALID_RELATION',
        `The relation fields "${a.context.field.name}" on model "${a.owner.model.name}" and "${b.context.field.name}" on model "${b.owner.model.name}" both provide the "fields" or "references" argument in the @relation attribute. You have to provide it only on one of the two fields.`,
        a.context.declaration.span,
      );
      return;
    }
    if (!aDefines && !bDefines) {
      this.report(
        'E_INVALID_RELATION',
        `The relation fields "${a.context.field.name}" on model "${a.owner.model.name}" and "${b.context.field.name}" on model "${b.owner.model.name}" do not provide the "fields" argument in the @relation attribute. You have to provide it on one of the two fields.`,
        a.context.declaration.span,
      );
      return;
    }

    const [definingSide, backSide] = aDefines ? [a, b] : [b, a];
    if (backSide.context.field.isRequired) {
      this.report(
        'E_INVALID_RELATION',
        `The side of the one-to-one relation without a relation scalar must be optional. Make "${backSide.context.field.name}" on model "${backSide.owner.model.name}" optional.`,
        backSide.context.declaration.span,
      );
    }
    this.resolveDefiningSide(definingSide, backSide, 'one-to-one');
  }

  private resolveManyToMany(a: RelationSide, b: RelationSide): void {
    let valid = true;

    for (const side of [a, b]) {
      if (definesKeys(side)) {
        valid = false;
        this.report(
          'E_INVALID_RELATION',
          `Implicit many-to-many relations must not specify the "fields" or "references" argument. Remove them from "${side.context.field.name}" on model "${side.owner.model.name}".`,
          side.context.declaration.span,
        );
      }
      if (side.args.onDelete || side.args.onUpdate) {
        valid = false;
        this.report(
          'E_INVALID_RELATION',
          `Referential actions are not supported on the many-to-many relation field "${side.context.field.name}" on model "${side.owner.model.name}".`,
          side.context.declaration.span,
        );
      }
      const primaryKey = side.owner.model.primaryKey;
      if (!primaryKey || primaryKey.fields.length !== 1) {
        valid = false;
        this.report(
          'E_INVALID_RELATION',
          `The model "${side.owner.model.name}" takes part in the many-to-many relation "${side.name}" but has no single-field @id. Use an explicit relation model instead.`,
          side.context.declaration.span,
        );
      }
    }

    if (!valid) return;

    const [from, to] = [a, b].sort((x, y) => compareCodePoints(endpointKey(x), endpointKey(y)));
    this.relations.push({
      name: a.name,
      kind: 'many-to-many',
      from: { model: from.owner.model.name, field: from.context.field.name },
      to: { model: to.owner.model.name, field: to.context.field.name },
      fields: [],
      references: [],
    });
  }

  private resolveDefiningSide(
    side: RelationSide,
    back: RelationSide,
    kind: RelationKind,
  ): void {
    const { owner, context, args } = side;
    const field = context.field;
    const target = back.owner;
    const span = context.declaration.span;
    const label = `"${field.name}" on model "${owner.model.name}"`;

    if (back.args.onDelete || back.args.onUpdate) {
      this.report(
        'E_INVALID_RELATION',
        `Referential actions can only be set on the side of the relation that defines "fields", not on "${back.context.field.name}" in model "${target.model.name}".`,
        back.context.declaration.span,
      );
    }

    if (!args.fields || !args.references) {
      const missing = !args.fields ? 'fields' : 'references';
      this.report(
        'E_MISSING_RELATION_FIELDS',
        `The relation field ${label} must specify the "${missing}" argument in the @relation attribute.`,
        span,
      );
      return;
    }

    const { fields, references } = args;
    if (fields.length === 0 || fields.length !== references.length) {
      this.report(
        'E_INVALID_RELATION',
        `The relation field ${label} must specify the same, non-zero number of fields in "fields" and "references".`,
        span,
      );
      return;
    }

    const scalars = this.lookupScalars(owner, fields, 'fields', span);
    const referenced = this.lookupScalars(target, references, 'references', span);
    if (!scalars || !referenced) return;

    let typesMatch = true;
    scalars.forEach((scalar, i) => {
      const other = referenced[i];
      if (scalar.type !== other.type) {
        typesMatch = false;
        this.report(
          'E_INVALID_RELATION',
          `The type of the field "${scalar.name}" in the model "${owner.model.name}" is not matching the type of the referenced field "${other.name}" in model "${target.model.name}".`,
          span,
        );
      }
    });
    if (!typesMatch) return;

    if (!isUniqueCriterion(target.model, references)) {
      const suggestion =
        references.length === 1
          ? `an @unique attribute to the field "${references[0]}"`
          : `@@unique([${references.join(', ')}])`;
      this.report(
        'E_INVALID_RELATION',
        `The argument "references" must refer to a unique criterion in the related model. Consider adding ${suggestion} in the model "${target.model.name}".`,
        span,
      );
    }

    if (kind === 'one-to-one' && !isUniqueCriterion(owner.model, fields)) {
      const suggestion =
        fields.length === 1
          ? `add an @unique attribute to the field "${fields[0]}"`
          : `add @@unique([${fields.join(', ')}])`;
      this.report(
        'E_INVALID_RELATION',
        `A one-to-one relation must use unique fields on the defining side. Either ${suggestion}, or change the relation to one-to-many.`,
        span,
      );
    }

    const anyOptional = scalars.some((s) => !s.isRequired);
    const anyRequired = scalars.some((s) => s.isRequired);
    const scalarNames = fields.join(', ');
    if (field.isRequired && anyOptional) {
      this.report(
        'E_INVALID_RELATION',
        `The relation field ${label} uses the scalar fields ${scalarNames}. At least one of those fields is optional. Hence the relation field must be optional as well.`,
        span,
      );
    } else if (!field.isRequired && !anyOptional) {
      this.diagnostics.push(
        warning(
          'W_RELATION_OPTIONALITY',
          `The relation field ${label} uses the scalar fields ${scalarNames}. All those fields are required. Hence the relation field should be required as well.`,
          span,
        ),
      );
    }

    for (const action of [args.onDelete, args.onUpdate]) {
      if (action === 'SetNull' && anyRequired) {
        this.diagnostics.push(
          warning(
            'W_SET_NULL_ON_REQUIRED',
            `The referential action "SetNull" on relation field ${label} requires all of its scalar fields to be optional.`,
            span,
          ),
        );
        break;
      }
    }

    scalars.forEach((scalar) => {
      scalar.isReadOnly = true;
    });

    const onDelete = args.onDelete ?? (anyOptional ? 'SetNull' : 'Restrict');
    const onUpdate = args.onUpdate ?? 'Cascade';
    field.relation = { name: side.name, fields, references, onDelete, onUpdate };

    this.relations.push({
      name: side.name,
      kind,
      from: { model: owner.model.name, field: field.name },
      to: { model: target.model.name, field: back.context.field.name },
      fields,
      references,
      onDelete,
      onUpdate,
    });
  }

  private lookupScalars(
    model: ModelContext,
    names: string[],
    argument: 'fields' | 'references',
    span: Span,
  ): ResolvedField[] | undefined {
    const missing = names.filter((n) => !model.fields.has(n));
    const found = names.flatMap((n) => {
      const context = model.fields.get(n);
      return context ? [context.field] : [];
    });
    const relationFields = found.filter((f) => f.kind === 'object');

    if (missing.length > 0) {
      this.report(
        'E_INVALID_RELATION',
        `The argument "${argument}" must refer only to existing fields in the model "${model.model.name}". The following fields do not exist: ${missing.join(', ')}.`,
        span,
      );
      return undefined;
    }
    if (relationFields.length > 0) {
      this.report(
        'E_INVALID_RELATION',
        `The argument "${argument}" must refer only to scalar fields. But it is referencing the following relation fields: ${relationFields.map((f) => f.name).join(', ')}.`,
        span,
      );
      return undefined;
    }
    return found;
  }

  private report(code: string, message: string, span?: Span): void {
    this.diagnostics.push(error(code, message, span));
  }
}

function definesKeys(side: RelationSide): boolean {
  return side.args.fields !== undefined || side.args.references !== undefined;
}

function endpointKey(side: RelationSide): string {
  return `${side.owner.model.name}.${side.context.field.name}`;
}
