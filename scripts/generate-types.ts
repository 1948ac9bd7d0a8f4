import * as fs from 'fs';
import * as path from 'path';

import { analyzeDataModel } from '../src/data-model/resolver';
import { resolveConfiguration } from '../src/environment/configuration';
import { Environment, loadEnvironment } from '../src/environment/dotenv';
import {
  Diagnostic,
  SchemaError,
  SchemaValidationError,
  formatDiagnostic,
  hasErrors,
} from '../src/language/diagnostics';
import { parseSchema } from '../src/language/parser';
import {
  GeneratedFile,
  generateClientTypes,
  generatorSettings,
} from '../src/generator/type-generator';

export interface GeneratorOutput {
  generator: string;
  /** Output directory as written in the generator block. */
  output: string;
  files: GeneratedFile[];
}

export interface GenerationPlan {
  outputs: GeneratorOutput[];
  warnings: Diagnostic[];
}

/**
 * Resolves a schema and lists the files each generator block would write.
 * Throws a SchemaError when the schema or its configuration is invalid.
 */
export function planGeneration(schema: string, env: Environment): GenerationPlan {
  const document = parseSchema(schema);
  const { dataModel, diagnostics } = analyzeDataModel(document);
  if (hasErrors(diagnostics)) {
    throw new SchemaValidationError(diagnostics);
  }
  const configuration = resolveConfiguration(document, env);

  const outputs = configuration.generators.map((generator) => {
    const settings = generatorSettings(generator);
    return {
      generator: generator.name,
      output: settings.output,
      files: generateClientTypes(dataModel, settings),
    };
  });
  return { outputs, warnings: diagnostics };
}

/**
 * True when clearing `outputDir` would delete one of `protectedDirs` or a
 * directory above it.
 */
export function isUnsafeOutputDir(outputDir: string, protectedDirs: string[]): boolean {
  return protectedDirs.some((dir) => {
    const relative = path.relative(path.resolve(outputDir), path.resolve(dir));
    if (relative === '') return true;
    const outside = relative === '..' || relative.startsWith(`..${path.sep}`);
    return !outside && !path.isAbsolute(relative);
  });
}

/**
 * Main execution logic
 */
function run(): void {
  const schemaPath = path.resolve(process.argv[2] ?? path.join('prisma', 'schema.prisma'));
  if (!fs.existsSync(schemaPath)) {
    console.error(`Schema not found: ${schemaPath}`);
    process.exitCode = 1;
    return;
  }

  const dotenvPath = path.join(process.cwd(), '.env');
  const env = loadEnvironment({
    processEnv: process.env,
    dotenv: fs.existsSync(dotenvPath) ? fs.readFileSync(dotenvPath, 'utf8') : undefined,
  });

  let plan: GenerationPlan;
  try {
    plan = planGeneration(fs.readFileSync(schemaPath, 'utf8'), env);
  } catch (err) {
    if (!(err instanceof SchemaError)) throw err;
    console.error(err.message);
    err.diagnostics.forEach((d) => console.error(`  ${formatDiagnostic(d)}`));
    process.exitCode = 1;
    return;
  }

  plan.warnings.forEach((d) => console.warn(formatDiagnostic(d)));
  if (plan.outputs.length === 0) {
    console.log('No generator blocks found, nothing to do.');
    return;
  }

  const protectedDirs = [process.cwd(), path.dirname(schemaPath)];
  for (const { generator, output, files } of plan.outputs) {
    // Relative outputs are taken from the schema's directory
    const outputDir = path.resolve(path.dirname(schemaPath), output);
    if (isUnsafeOutputDir(outputDir, protectedDirs)) {
      console.error(
        `Refusing to clear ${outputDir} for generator "${generator}": it contains the project or the schema. Choose a dedicated output directory.`,
      );
      process.exitCode = 1;
      continue;
    }
    if (fs.existsSync(outputDir)) {
      console.log(`Clearing ${outputDir}...`);
      fs.rmSync(outputDir, { recursive: true, force: true });
    }
    for (const file of files) {
      const target = path.join(outputDir, file.path);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, file.content);
    }
    console.log(`Generated ${files.length} files for generator "${generator}" in ${outputDir}`);
  }
}

if (require.main === module) {
  run();
}
