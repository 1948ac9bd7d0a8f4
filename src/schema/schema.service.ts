import { Injectable, Logger, PayloadTooLargeException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DataModel } from '../data-model/data-model.types';
import { analyzeDataModel } from '../data-model/resolver';
import { analyzeConfiguration } from '../environment/configuration';
import { Environment, loadEnvironment } from '../environment/dotenv';
import { SchemaDocument } from '../language/ast';
import { Diagnostic, SchemaValidationError, hasErrors } from '../language/diagnostics';
import { parseSchema, tryParseSchema } from '../language/parser';
import { printSchema } from '../language/printer';
import { EnvironmentInput, SchemaResolution, ValidationResult } from './interfaces/schema.interface';

@Injectable()
export class SchemaService {
  private readonly logger = new Logger(SchemaService.name);

  constructor(private readonly configService: ConfigService) {}

  parse(source: string): SchemaDocument {
    this.checkLength(source);
    return parseSchema(source);
  }

  format(source: string): string {
    return printSchema(this.parse(source));
  }

  /**
   * Runs every check over the schema and reports the outcome instead of
   * throwing. Parse errors stop the run before the model is resolved.
   */
  validate(source: string, input: EnvironmentInput = {}): ValidationResult {
    this.checkLength(source);
    const parsed = tryParseSchema(source);
    if (hasErrors(parsed.diagnostics)) {
      return { valid: false, diagnostics: parsed.diagnostics };
    }

    const diagnostics = this.analyze(parsed.document, input).diagnostics;
    const all = [...parsed.diagnostics, ...diagnostics];
    return { valid: !hasErrors(all), diagnostics: all };
  }

  resolve(source: string, input: EnvironmentInput = {}): SchemaResolution {
    const document = this.parse(source);
    const { resolution, diagnostics } = this.analyze(document, input);
    if (hasErrors(diagnostics)) {
      this.logger.debug(`Schema rejected with ${diagnostics.length} diagnostics`);
      throw new SchemaValidationError(diagnostics);
    }
    return resolution;
  }

  /** Parses and resolves the data model only; datasource URLs are not read. */
  resolveDataModel(source: string): { document: SchemaDocument; dataModel: DataModel } {
    const document = this.parse(source);
    const { dataModel, diagnostics } = analyzeDataModel(document);
    if (hasErrors(diagnostics)) {
      throw new SchemaValidationError(diagnostics);
    }
    return { document, dataModel };
  }

  private analyze(
    document: SchemaDocument,
    input: EnvironmentInput,
  ): { resolution: SchemaResolution; diagnostics: Diagnostic[] } {
    const model = analyzeDataModel(document);
    const config = analyzeConfiguration(document, this.environment(input));
    const diagnostics = dedupe([...model.diagnostics, ...config.diagnostics]);

    return {
      resolution: {
        ...config.configuration,
        dataModel: model.dataModel,
        warnings: diagnostics.filter((d) => d.severity === 'warning'),
      },
      diagnostics,
    };
  }

  private environment(input: EnvironmentInput): Environment {
    const passthrough = this.configService.get<boolean>('SCHEMA_ENV_PASSTHROUGH') ?? false;
    let processEnv: Environment = input.env ?? {};
    if (input.env === undefined && input.dotenv === undefined && passthrough) {
      processEnv = process.env;
    }
    return loadEnvironment({ processEnv, dotenv: input.dotenv });
  }

  private checkLength(source: string): void {
    const maxLength = this.configService.getOrThrow<number>('SCHEMA_MAX_LENGTH');
    if (source.length > maxLength) {
      throw new PayloadTooLargeException(
        `Schema text is ${source.length} characters long; the limit is ${maxLength}`,
      );
    }
  }
}

// The resolver and the configuration pass both check the datasource provider.
function dedupe(diagnostics: Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter((d) => {
    const key = `${d.code}|${d.message}|${d.span?.start.offset ?? ''}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
