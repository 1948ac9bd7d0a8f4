import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import { ApiStandardResponse } from '../common/decorators/swagger-response.decorator';
import { DiffSchemasDto, MigrationPlanDto } from './dto/diff-schemas.dto';
import { MigrateService, MigrationPlan } from './migrate.service';

@ApiTags('migrations')
@Controller('migrations')
export class MigrateController {
  constructor(private readonly migrateService: MigrateService) {}

  @Post('diff')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List the steps that migrate one schema to another' })
  @ApiStandardResponse(MigrationPlanDto)
  diff(@Body() body: DiffSchemasDto): MigrationPlan {
    return this.migrateService.diff(body);
  }
}
