import { DataModel } from '../../data-model/data-model.types';
import { ResolvedConfiguration } from '../../environment/configuration';
import { Diagnostic } from '../../language/diagnostics';

export interface EnvironmentInput {
  env?: Record<string, string>;
  dotenv?: string;
}

export interface ValidationResult {
  valid: boolean;
  diagnostics: Diagnostic[];
}

export interface SchemaResolution extends ResolvedConfiguration {
  dataModel: DataModel;
  warnings: Diagnostic[];
}
