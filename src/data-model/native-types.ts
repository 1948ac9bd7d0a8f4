import { z } from 'zod';

import { PROVIDERS, Provider, SCALAR_TYPES, ScalarType } from './connectors';
import catalog from './native-types.json';

const NativeTypeSpecSchema = z.object({
  scalars: z.array(z.enum(SCALAR_TYPES)),
  /** Inclusive [min, max] number of arguments. */
  arguments: z.tuple([z.number().int(), z.number().int()]),
});

const NativeTypeCatalogSchema = z.record(
  z.enum(PROVIDERS),
  z.record(z.string(), NativeTypeSpecSchema),
);

export type NativeTypeSpec = z.infer<typeof NativeTypeSpecSchema>;

const NATIVE_TYPES = NativeTypeCatalogSchema.parse(catalog);

export function findNativeType(provider: Provider, name: string): NativeTypeSpec | undefined {
  const types = NATIVE_TYPES[provider];
  return Object.prototype.hasOwnProperty.call(types, name) ? types[name] : undefined;
}

/**
 * Checks a native type attribute against the connector catalog and returns
 * the problem, if any, as a message.
 */
export function checkNativeType(
  provider: Provider,
  name: string,
  scalar: ScalarType,
  argumentCount: number,
): string | undefined {
  const spec = findNativeType(provider, name);
  if (!spec) {
    return `Native type ${name} is not supported for ${provider} connector.`;
  }
  if (!spec.scalars.includes(scalar)) {
    return `Native type ${name} is not compatible with declared field type ${scalar}, expected field type ${spec.scalars.join(' or ')}.`;
  }
  const [min, max] = spec.arguments;
  if (argumentCount < min || argumentCount > max) {
    const expected = min === max ? `${min}` : `between ${min} and ${max}`;
    return `Native type ${name} expects ${expected} arguments, but received ${argumentCount}.`;
  }
  return undefined;
}
