import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import { ApiStandardResponse } from '../common/decorators/swagger-response.decorator';
import { GeneratedFilesDto, GenerateTypesDto } from './dto/generate-types.dto';
import { GeneratorService } from './generator.service';
import { GeneratedFile } from './type-generator';

@ApiTags('generators')
@Controller('generators')
export class GeneratorController {
  constructor(private readonly generatorService: GeneratorService) {}

  @Post('types')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Generate TypeScript types for the models of a schema' })
  @ApiStandardResponse(GeneratedFilesDto)
  generateTypes(@Body() body: GenerateTypesDto): { files: GeneratedFile[] } {
    return this.generatorService.generateTypes(body.schema, {
      target: body.target,
      validation: body.validation,
    });
  }
}
