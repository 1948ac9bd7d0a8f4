import {
  ConfigProperty,
  DatasourceBlock,
  Expression,
  GeneratorBlock,
  SchemaDocument,
  Span,
  datasourcesOf,
  findProperty,
  generatorsOf,
} from '../language/ast';
import {
  Diagnostic,
  SchemaValidationError,
  error,
  hasErrors,
} from '../language/diagnostics';
import { printExpression } from '../language/printer';
import { PROXY_PROTOCOLS, URL_PROTOCOLS, isProvider } from '../data-model/connectors';
import { Environment } from './dotenv';

export const RELATION_MODES = ['prisma', 'foreignKeys'] as const;

export type RelationMode = (typeof RELATION_MODES)[number];

export interface ResolvedDatasource {
  name: string;
  provider: string;
  url: string;
  directUrl?: string;
  shadowDatabaseUrl?: string;
  relationMode?: RelationMode;
  schemas: string[];
}

export interface ResolvedGenerator {
  name: string;
  provider: string;
  output?: string;
  previewFeatures: string[];
  binaryTargets: string[];
  config: Record<string, string>;
}

export interface ResolvedConfiguration {
  datasources: ResolvedDatasource[];
  generators: ResolvedGenerator[];
  /** Names of the environment variables read while resolving, in first-use order. */
  envVars: string[];
}

export interface ConfigurationAnalysis {
  configuration: ResolvedConfiguration;
  diagnostics: Diagnostic[];
}

export type ConfigValue =
  | { ok: true; value: string; envVar?: string }
  | { ok: false; diagnostic: Diagnostic; envVar?: string };

const DATASOURCE_KEYS = new Set([
  'provider',
  'url',
  'directUrl',
  'shadowDatabaseUrl',
  'relationMode',
  'schemas',
]);

const isRelationMode = (value: string): value is RelationMode =>
  RELATION_MODES.some((m) => m === value);

/**
 * Resolves a configuration value: a string literal is taken as is and
 * `env("NAME")` is looked up in `env`.
 */
export function resolveConfigValue(expression: Expression, env: Environment): ConfigValue {
  if (expression.kind === 'string') {
    return { ok: true, value: expression.value };
  }

  if (expression.kind === 'function' && expression.name === 'env') {
    const [argument] = expression.arguments;
    if (
      expression.arguments.length !== 1 ||
      argument.name !== undefined ||
      argument.value.kind !== 'string'
    ) {
      return {
        ok: false,
        diagnostic: error(
          'E_INVALID_CONFIG_VALUE',
          'env() takes exactly one string argument naming the variable.',
          expression.span,
        ),
      };
    }

    const envVar = argument.value.value;
    const value = Object.prototype.hasOwnProperty.call(env, envVar) ? env[envVar] : undefined;
    if (typeof value !== 'string' || value === '') {
      return {
        ok: false,
        envVar,
        diagnostic: error(
          'E_ENV_VAR_NOT_FOUND',
          `Environment variable not found: ${envVar}.`,
          expression.span,
        ),
      };
    }
    return { ok: true, value, envVar };
  }

  return {
    ok: false,
    diagnostic: error(
      'E_INVALID_CONFIG_VALUE',
      `Expected a string or env("NAME"), but found ${printExpression(expression)}.`,
      expression.span,
    ),
  };
}

/**
 * Resolves datasource and generator blocks against an environment and throws
 * a SchemaValidationError carrying every diagnostic when one is an error.
 */
export function resolveConfiguration(
  document: SchemaDocument,
  env: Environment,
): ResolvedConfiguration {
  const { configuration, diagnostics } = analyzeConfiguration(document, env);
  if (hasErrors(diagnostics)) {
    throw new SchemaValidationError(diagnostics);
  }
  return configuration;
}

export function analyzeConfiguration(
  document: SchemaDocument,
  env: Environment,
): ConfigurationAnalysis {
  const resolver = new ConfigurationResolver(env);
  const datasources = datasourcesOf(document).flatMap((block) => {
    const resolved = resolver.datasource(block);
    return resolved ? [resolved] : [];
  });
  const generators = generatorsOf(document).flatMap((block) => {
    const resolved = resolver.generator(block);
    return resolved ? [resolved] : [];
  });

  return {
    configuration: { datasources, generators, envVars: [...resolver.envVars] },
    diagnostics: resolver.diagnostics,
  };
}

class ConfigurationResolver {
  readonly diagnostics: Diagnostic[] = [];
  readonly envVars = new Set<string>();

  constructor(private readonly env: Environment) {}

  datasource(block: DatasourceBlock): ResolvedDatasource | undefined {
    for (const property of block.properties) {
      if (!DATASOURCE_KEYS.has(property.key)) {
        this.report(
          'E_UNKNOWN_PROPERTY',
          `Property not known: "${property.key}" in datasource "${block.name}".`,
          property.span,
        );
      }
    }

    const provider = this.literalProvider(block);
    const urlProperty = findProperty(block, 'url');
    if (!urlProperty) {
      this.report('E_MISSING_URL', `The datasource "${block.name}" must define a "url".`, block.span);
    }
    const url = urlProperty ? this.value(urlProperty) : undefined;

    if (provider !== undefined && url !== undefined && urlProperty) {
      this.checkProtocol(block, provider, url, urlProperty.value.span);
    }

    const relationMode = this.relationMode(block);
    const schemas = this.stringList(findProperty(block, 'schemas')) ?? [];
    const directUrlProperty = findProperty(block, 'directUrl');
    const shadowProperty = findProperty(block, 'shadowDatabaseUrl');
    const directUrl = directUrlProperty ? this.value(directUrlProperty) : undefined;
    const shadowDatabaseUrl = shadowProperty ? this.value(shadowProperty) : undefined;

    if (provider === undefined || url === undefined) return undefined;

    const resolved: ResolvedDatasource = { name: block.name, provider, url, schemas };
    if (directUrl !== undefined) resolved.directUrl = directUrl;
    if (shadowDatabaseUrl !== undefined) resolved.shadowDatabaseUrl = shadowDatabaseUrl;
    if (relationMode !== undefined) resolved.relationMode = relationMode;
    return resolved;
  }

  generator(block: GeneratorBlock): ResolvedGenerator | undefined {
    const resolved: ResolvedGenerator = {
      name: block.name,
      provider: '',
      previewFeatures: [],
      binaryTargets: [],
      config: {},
    };
    let hasProvider = false;

    for (const property of block.properties) {
      switch (property.key) {
        case 'provider': {
          const value = this.value(property);
          if (value !== undefined) {
            resolved.provider = value;
            hasProvider = true;
          }
          break;
        }
        case 'output': {
          const value = this.value(property);
          if (value !== undefined) resolved.output = value;
          break;
        }
        case 'previewFeatures':
          resolved.previewFeatures = this.stringList(property) ?? [];
          break;
        case 'binaryTargets':
          resolved.binaryTargets = this.binaryTargets(property);
          break;
        default: {
          const { value } = property;
          const isConfigValue =
            value.kind === 'string' || (value.kind === 'function' && value.name === 'env');
          const resolvedValue = isConfigValue ? this.value(property) : printExpression(value);
          if (resolvedValue !== undefined) resolved.config[property.key] = resolvedValue;
        }
      }
    }

    if (!findProperty(block, 'provider')) {
      this.report(
        'E_MISSING_PROVIDER',
        `The generator "${block.name}" must define a "provider".`,
        block.span,
      );
    }
    return hasProvider ? resolved : undefined;
  }

  private literalProvider(block: DatasourceBlock): string | undefined {
    const property = findProperty(block, 'provider');
    if (!property) {
      this.report(
        'E_MISSING_PROVIDER',
        `The datasource "${block.name}" must define a "provider".`,
        block.span,
      );
      return undefined;
    }
    if (property.value.kind !== 'string') {
      this.report(
        'E_INVALID_PROVIDER',
        'The "provider" of a datasource must be a string literal.',
        property.span,
      );
      return undefined;
    }
    return property.value.value;
  }

  private checkProtocol(block: DatasourceBlock, provider: string, url: string, span: Span): void {
    if (!isProvider(provider)) return;
    const protocols = URL_PROTOCOLS[provider];
    if ([...protocols, ...PROXY_PROTOCOLS].some((p) => url.startsWith(p))) return;

    const expected = protocols.map((p) => `"${p}"`).join(' or ');
    this.report(
      'E_INVALID_URL',
      `Error validating datasource "${block.name}": the URL must start with the protocol ${expected}.`,
      span,
    );
  }

  private relationMode(block: DatasourceBlock): RelationMode | undefined {
    const property = findProperty(block, 'relationMode');
    if (!property) return undefined;
    if (property.value.kind === 'string' && isRelationMode(property.value.value)) {
      return property.value.value;
    }
    this.report(
      'E_INVALID_CONFIG_VALUE',
      `Invalid "relationMode" on datasource "${block.name}". Allowed values: ${RELATION_MODES.map((m) => `"${m}"`).join(', ')}.`,
      property.span,
    );
    return undefined;
  }

  private value(property: ConfigProperty): string | undefined {
    const result = resolveConfigValue(property.value, this.env);
    if (result.envVar !== undefined) this.envVars.add(result.envVar);
    if (!result.ok) {
      this.diagnostics.push(result.diagnostic);
      return undefined;
    }
    return result.value;
  }

  private stringList(property: ConfigProperty | undefined): string[] | undefined {
    if (!property) return undefined;
    const { value } = property;
    if (value.kind === 'array') {
      const items: string[] = [];
      for (const item of value.items) {
        if (item.kind !== 'string') break;
        items.push(item.value);
      }
      if (items.length === value.items.length) return items;
    }
    this.report(
      'E_INVALID_CONFIG_VALUE',
      `"${property.key}" must be a list of strings.`,
      property.span,
    );
    return undefined;
  }

  private binaryTargets(property: ConfigProperty): string[] {
    const { value } = property;
    const items = value.kind === 'array' ? value.items : [value];
    return items.flatMap((item) => {
      const result = resolveConfigValue(item, this.env);
      if (result.envVar !== undefined) this.envVars.add(result.envVar);
      if (!result.ok) {
        this.diagnostics.push(result.diagnostic);
        return [];
      }
      return [result.value];
    });
  }

  private report(code: string, message: string, span?: Span): void {
    this.diagnostics.push(error(code, message, span));
  }
}
