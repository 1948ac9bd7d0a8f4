import {
  DataModel,
  IndexDefinition,
  ResolvedEnum,
  ResolvedField,
  ResolvedModel,
} from '../data-model/data-model.types';

export type FieldChange = 'type' | 'arity' | 'default' | 'unique';

export interface IndexStep {
  model: string;
  unique: boolean;
  fields: string[];
  name?: string;
}

export type MigrationStep =
  | { kind: 'CreateEnum'; enum: string; values: string[] }
  | { kind: 'AlterEnum'; enum: string; addedValues: string[]; removedValues: string[] }
  | { kind: 'CreateModel'; model: string; fields: string[] }
  | { kind: 'AddField'; model: string; field: string; type: string }
  | {
      kind: 'AlterField';
      model: string;
      field: string;
      from: string;
      to: string;
      changes: FieldChange[];
    }
  | ({ kind: 'CreateIndex' } & IndexStep)
  | ({ kind: 'DropIndex' } & IndexStep)
  | { kind: 'DropField'; model: string; field: string }
  | { kind: 'DropModel'; model: string }
  | { kind: 'DropEnum'; enum: string };

/**
 * Compares two data models and lists the steps that turn `from` into `to`.
 * Relation fields are not columns and produce no steps.
 */
export function diffDataModels(from: DataModel, to: DataModel): MigrationStep[] {
  const steps: MigrationStep[] = [];
  const fromEnums = byName(from.enums);
  const toEnums = byName(to.enums);
  const fromModels = byName(from.models);
  const toModels = byName(to.models);

  for (const target of to.enums) {
    const source = fromEnums.get(target.name);
    if (!source) {
      steps.push({ kind: 'CreateEnum', enum: target.name, values: valueNames(target) });
      continue;
    }
    const before = valueNames(source);
    const after = valueNames(target);
    const addedValues = after.filter((v) => !before.includes(v));
    const removedValues = before.filter((v) => !after.includes(v));
    if (addedValues.length > 0 || removedValues.length > 0) {
      steps.push({ kind: 'AlterEnum', enum: target.name, addedValues, removedValues });
    }
  }

  const createdModels = to.models.filter((m) => !fromModels.has(m.name));
  for (const model of createdModels) {
    steps.push({
      kind: 'CreateModel',
      model: model.name,
      fields: columns(model).map((f) => f.name),
    });
  }

  const keptModels = to.models.flatMap((target) => {
    const source = fromModels.get(target.name);
    return source ? [{ source, target }] : [];
  });

  for (const { source, target } of keptModels) {
    const before = byName(columns(source));
    for (const field of columns(target)) {
      const previous = before.get(field.name);
      if (!previous) {
        steps.push({
          kind: 'AddField',
          model: target.name,
          field: field.name,
          type: describeType(field),
        });
        continue;
      }
      const changes = fieldChanges(previous, field);
      if (changes.length > 0) {
        steps.push({
          kind: 'AlterField',
          model: target.name,
          field: field.name,
          from: describeType(previous),
          to: describeType(field),
          changes,
        });
      }
    }
  }

  for (const model of createdModels) {
    for (const index of indexSteps(model)) {
      steps.push({ kind: 'CreateIndex', ...index });
    }
  }
  for (const { source, target } of keptModels) {
    const before = indexSteps(source);
    const after = indexSteps(target);
    const beforeKeys = new Set(before.map(indexKey));
    const afterKeys = new Set(after.map(indexKey));
    for (const index of before) {
      if (!afterKeys.has(indexKey(index))) steps.push({ kind: 'DropIndex', ...index });
    }
    for (const index of after) {
      if (!beforeKeys.has(indexKey(index))) steps.push({ kind: 'CreateIndex', ...index });
    }
  }

  for (const { source, target } of keptModels) {
    const after = byName(columns(target));
    for (const field of columns(source)) {
      if (!after.has(field.name)) {
        steps.push({ kind: 'DropField', model: target.name, field: field.name });
      }
    }
  }

  for (const model of from.models) {
    if (!toModels.has(model.name)) steps.push({ kind: 'DropModel', model: model.name });
  }
  for (const e of from.enums) {
    if (!toEnums.has(e.name)) steps.push({ kind: 'DropEnum', enum: e.name });
  }

  return steps;
}

/** Renders a migration step as one line of text. */
export function summarizeStep(step: MigrationStep): string {
  switch (step.kind) {
    case 'CreateEnum':
      return `Create enum ${step.enum} (${step.values.join(', ')})`;
    case 'AlterEnum': {
      const parts: string[] = [];
      if (step.addedValues.length > 0) parts.push(`add ${step.addedValues.join(', ')}`);
      if (step.removedValues.length > 0) parts.push(`remove ${step.removedValues.join(', ')}`);
      return `Alter enum ${step.enum}: ${parts.join('; ')}`;
    }
    case 'CreateModel':
      return `Create model ${step.model} (${step.fields.join(', ')})`;
    case 'AddField':
      return `Add field ${step.model}.${step.field} (${step.type})`;
    case 'AlterField':
      return `Alter field ${step.model}.${step.field} from ${step.from} to ${step.to} (${step.changes.join(', ')})`;
    case 'CreateIndex':
      return `Create ${step.unique ? 'unique index' : 'index'} on ${step.model} (${step.fields.join(', ')})`;
    case 'DropIndex':
      return `Drop ${step.unique ? 'unique index' : 'index'} on ${step.model} (${step.fields.join(', ')})`;
    case 'DropField':
      return `Drop field ${step.model}.${step.field}`;
    case 'DropModel':
      return `Drop model ${step.model}`;
    case 'DropEnum':
      return `Drop enum ${step.enum}`;
  }
}

function byName<T extends { name: string }>(items: T[]): Map<string, T> {
  return new Map(items.map((item) => [item.name, item]));
}

function valueNames(e: ResolvedEnum): string[] {
  return e.values.map((v) => v.name);
}

function columns(model: ResolvedModel): ResolvedField[] {
  return model.fields.filter((f) => f.kind !== 'object');
}

function describeType(field: ResolvedField): string {
  if (field.isList) return `${field.type}[]`;
  return field.isRequired ? field.type : `${field.type}?`;
}

function fieldChanges(before: ResolvedField, after: ResolvedField): FieldChange[] {
  const changes: FieldChange[] = [];
  if (before.type !== after.type) changes.push('type');
  if (before.isList !== after.isList || before.isRequired !== after.isRequired) {
    changes.push('arity');
  }
  if (JSON.stringify(before.default) !== JSON.stringify(after.default)) changes.push('default');
  if (before.isUnique !== after.isUnique) changes.push('unique');
  return changes;
}

function indexSteps(model: ResolvedModel): IndexStep[] {
  const toStep = (index: IndexDefinition, unique: boolean): IndexStep => {
    const step: IndexStep = { model: model.name, unique, fields: index.fields };
    const name = index.map ?? index.name;
    if (name !== undefined) step.name = name;
    return step;
  };
  return [
    ...model.uniqueIndexes.map((i) => toStep(i, true)),
    ...model.indexes.map((i) => toStep(i, false)),
  ];
}

function indexKey(index: IndexStep): string {
  return `${index.unique ? 'unique' : 'index'}:${index.fields.join(',')}`;
}
