import { Injectable, Logger } from '@nestjs/common';

import { SchemaService } from '../schema/schema.service';
import { MigrationStep, diffDataModels, summarizeStep } from './diff';
import { formatMigrationName } from './migration-name';

export interface MigrationPlan {
  migrationName?: string;
  steps: MigrationStep[];
  summary: string[];
}

export interface DiffRequest {
  from: string;
  to: string;
  name?: string;
}

@Injectable()
export class MigrateService {
  private readonly logger = new Logger(MigrateService.name);

  constructor(private readonly schemaService: SchemaService) {}

  diff(request: DiffRequest, now: Date = new Date()): MigrationPlan {
    const from = this.schemaService.resolveDataModel(request.from).dataModel;
    const to = this.schemaService.resolveDataModel(request.to).dataModel;
    const steps = diffDataModels(from, to);
    this.logger.debug(`Diff produced ${steps.length} steps`);

    const plan: MigrationPlan = { steps, summary: steps.map(summarizeStep) };
    if (request.name !== undefined) {
      plan.migrationName = formatMigrationName(request.name, now);
    }
    return plan;
  }
}
