import { Expression, FunctionCall } from '../language/ast';
import { Diagnostic, error } from '../language/diagnostics';
import { printExpression } from '../language/printer';
import { Provider, ScalarType } from './connectors';
import { DefaultValue, FieldKind, LiteralValue } from './data-model.types';

export interface DefaultTarget {
  model: string;
  field: string;
  kind: FieldKind;
  type: string;
  isList: boolean;
  isId: boolean;
  provider?: Provider;
  /** Values of the field's enum, when it is an enum field. */
  enumValues?: ReadonlySet<string>;
}

interface FunctionRule {
  types: ScalarType[];
  accepts: (args: Expression[]) => boolean;
}

const noArguments = (args: Expression[]): boolean => args.length === 0;

const oneOptional =
  (...allowed: number[]) =>
  (args: Expression[]): boolean =>
    args.length === 0 ||
    (args.length === 1 && args[0].kind === 'number' && allowed.includes(args[0].value));

const FUNCTIONS: Record<string, FunctionRule> = {
  autoincrement: { types: ['Int', 'BigInt'], accepts: noArguments },
  sequence: { types: ['Int', 'BigInt'], accepts: () => true },
  now: { types: ['DateTime'], accepts: noArguments },
  uuid: { types: ['String'], accepts: oneOptional(4, 7) },
  cuid: { types: ['String'], accepts: oneOptional(1, 2) },
  ulid: { types: ['String'], accepts: noArguments },
  nanoid: {
    types: ['String'],
    accepts: (args) =>
      args.length === 0 ||
      (args.length === 1 &&
        args[0].kind === 'number' &&
        Number.isInteger(args[0].value) &&
        args[0].value >= 2 &&
        args[0].value <= 255),
  },
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const INTEGER = /^-?\d+$/;

/**
 * Resolves the argument of `@default` for a field, pushing a diagnostic and
 * returning undefined when the value does not fit the field.
 */
export function resolveDefault(
  expression: Expression,
  target: DefaultTarget,
  diagnostics: Diagnostic[],
): DefaultValue | undefined {
  const invalid = (detail?: string): undefined => {
    const reason = detail ?? `it is not a valid ${describeType(target)} value`;
    diagnostics.push(
      error(
        'E_INVALID_DEFAULT',
        `Invalid default value ${printExpression(expression)} on field "${target.field}" in model "${target.model}": ${reason}.`,
        expression.span,
      ),
    );
    return undefined;
  };

  if (expression.kind === 'function' && expression.name === 'dbgenerated') {
    const [arg] = expression.arguments;
    if (expression.arguments.length > 1 || (arg && arg.value.kind !== 'string')) {
      return invalid('dbgenerated() takes one optional string argument');
    }
    return {
      kind: 'function',
      name: 'dbgenerated',
      args: arg && arg.value.kind === 'string' ? [arg.value.value] : [],
    };
  }

  if (target.kind === 'unsupported') {
    return invalid('fields of type Unsupported only accept dbgenerated()');
  }

  if (target.isList) {
    if (expression.kind !== 'array') return invalid('list fields take a list of values');
    const values: LiteralValue[] = [];
    for (const item of expression.items) {
      const value = literalFor(item, target);
      if (value === undefined) return invalid();
      values.push(value);
    }
    return { kind: 'list', values };
  }

  if (target.kind === 'enum') {
    if (expression.kind === 'constant' && target.enumValues?.has(expression.value)) {
      return { kind: 'enum', value: expression.value };
    }
    return invalid(`it is not a value of the enum ${target.type}`);
  }

  if (expression.kind === 'function') {
    return resolveFunction(expression, target, invalid);
  }

  const value = literalFor(expression, target);
  return value === undefined ? invalid() : { kind: 'literal', value };
}

function resolveFunction(
  call: FunctionCall,
  target: DefaultTarget,
  invalid: (detail?: string) => undefined,
): DefaultValue | undefined {
  if (call.name === 'auto') {
    if (target.provider !== 'mongodb' || !target.isId) {
      return invalid('auto() is only supported on MongoDB @id fields');
    }
    return { kind: 'function', name: 'auto', args: [] };
  }

  const rule = Object.prototype.hasOwnProperty.call(FUNCTIONS, call.name)
    ? FUNCTIONS[call.name]
    : undefined;
  if (!rule) {
    return invalid(`${call.name}() is not a known default function`);
  }
  if (!rule.types.some((t) => t === target.type)) {
    return invalid(`${call.name}() cannot be used on fields of type ${target.type}`);
  }
  if (call.name === 'sequence' && target.provider !== 'cockroachdb') {
    return invalid('sequence() is only supported on CockroachDB');
  }

  const args = call.arguments.map((a) => a.value);
  if (!rule.accepts(args)) {
    return invalid(`invalid arguments for ${call.name}()`);
  }

  return {
    kind: 'function',
    name: call.name,
    args: args.flatMap((a) =>
      a.kind === 'number' || a.kind === 'string' ? [a.value] : [printExpression(a)],
    ),
  };
}

/** Converts a literal expression to a value of the target's scalar or enum type. */
function literalFor(expression: Expression, target: DefaultTarget): LiteralValue | undefined {
  if (target.kind === 'enum') {
    return expression.kind === 'constant' && target.enumValues?.has(expression.value)
      ? expression.value
      : undefined;
  }

  switch (target.type) {
    case 'String':
      return expression.kind === 'string' ? expression.value : undefined;
    case 'Int':
      return expression.kind === 'number' && Number.isSafeInteger(expression.value)
        ? expression.value
        : undefined;
    // Kept as written: 64-bit values do not fit a double.
    case 'BigInt':
      return expression.kind === 'number' && INTEGER.test(expression.raw)
        ? expression.raw
        : undefined;
    case 'Float':
    case 'Decimal':
      return expression.kind === 'number' ? expression.value : undefined;
    case 'Boolean':
      return expression.kind === 'boolean' ? expression.value : undefined;
    case 'DateTime':
      return expression.kind === 'string' &&
        ISO_DATE.test(expression.value) &&
        !Number.isNaN(Date.parse(expression.value))
        ? expression.value
        : undefined;
    case 'Json':
      return expression.kind === 'string' && isJson(expression.value) ? expression.value : undefined;
    case 'Bytes':
      return expression.kind === 'string' && BASE64.test(expression.value)
        ? expression.value
        : undefined;
    default:
      return undefined;
  }
}

function isJson(value: string): boolean {
  try {
    JSON.parse(value);
    return true;
  } catch {
    return false;
  }
}

function describeType(target: DefaultTarget): string {
  return target.isList ? `${target.type}[]` : target.type;
}
