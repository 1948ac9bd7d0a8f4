import { Module } from '@nestjs/common';

import { SchemaModule } from '../schema/schema.module';
import { GeneratorController } from './generator.controller';
import { GeneratorService } from './generator.service';

@Module({
  imports: [SchemaModule],
  controllers: [GeneratorController],
  providers: [GeneratorService],
})
export class GeneratorModule {}
