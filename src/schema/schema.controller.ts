import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import { ApiStandardResponse } from '../common/decorators/swagger-response.decorator';
import { SchemaDocument } from '../language/ast';
import {
  FormattedSchemaDto,
  SchemaDocumentDto,
  SchemaResolutionDto,
  ValidationResultDto,
} from './dto/schema-response.dto';
import { ResolveSchemaDto, SchemaSourceDto } from './dto/schema.dto';
import { SchemaResolution, ValidationResult } from './interfaces/schema.interface';
import { SchemaService } from './schema.service';

@ApiTags('schemas')
@Controller('schemas')
export class SchemaController {
  constructor(private readonly schemaService: SchemaService) {}

  @Post('parse')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Parse schema text into its syntax tree' })
  @ApiStandardResponse(SchemaDocumentDto)
  parse(@Body() body: SchemaSourceDto): SchemaDocument {
    return this.schemaService.parse(body.schema);
  }

  @Post('format')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reprint schema text in canonical layout' })
  @ApiStandardResponse(FormattedSchemaDto)
  format(@Body() body: SchemaSourceDto): { schema: string } {
    return { schema: this.schemaService.format(body.schema) };
  }

  @Post('validate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Check a schema and list its diagnostics' })
  @ApiStandardResponse(ValidationResultDto)
  validate(@Body() body: ResolveSchemaDto): ValidationResult {
    return this.schemaService.validate(body.schema, body);
  }

  @Post('resolve')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Resolve configuration blocks and the data model' })
  @ApiStandardResponse(SchemaResolutionDto)
  resolve(@Body() body: ResolveSchemaDto): SchemaResolution {
    return this.schemaService.resolve(body.schema, body);
  }
}
