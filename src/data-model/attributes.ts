import { Argument, Attribute, Expression } from '../language/ast';
import { printExpression } from '../language/printer';

/**
 * Finds an argument by name, falling back to the positional argument at
 * `position` when it has no name.
 */
export function findArgument(
  attribute: Attribute,
  name: string,
  position?: number,
): Argument | undefined {
  const named = attribute.arguments.find((a) => a.name === name);
  if (named) return named;
  if (position === undefined) return undefined;
  const positional = attribute.arguments[position];
  return positional && positional.name === undefined ? positional : undefined;
}

export function stringValue(expression: Expression | undefined): string | undefined {
  return expression?.kind === 'string' ? expression.value : undefined;
}

/**
 * Reads a field list such as `[a, b(sort: Desc)]`. Returns undefined when the
 * expression is not a list of field references.
 */
export function fieldList(expression: Expression | undefined): string[] | undefined {
  if (expression?.kind !== 'array') return undefined;
  const names: string[] = [];
  for (const item of expression.items) {
    if (item.kind === 'constant') names.push(item.value);
    else if (item.kind === 'function') names.push(item.name);
    else return undefined;
  }
  return names;
}

/** Native type arguments rendered as source text, e.g. `['10', '2']`. */
export function nativeTypeArguments(attribute: Attribute): string[] {
  return attribute.arguments.map((a) =>
    a.value.kind === 'string' ? a.value.value : printExpression(a.value),
  );
}

export function attributeLabel(attribute: Attribute): string {
  return `${attribute.scope === 'block' ? '@@' : '@'}${attribute.name}`;
}
