import { Module } from '@nestjs/common';

import { SchemaModule } from '../schema/schema.module';
import { MigrateController } from './migrate.controller';
import { MigrateService } from './migrate.service';

@Module({
  imports: [SchemaModule],
  controllers: [MigrateController],
  providers: [MigrateService],
})
export class MigrateModule {}
