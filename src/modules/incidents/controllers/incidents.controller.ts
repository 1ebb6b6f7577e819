import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { RequestContext } from '../../common/context/request-context';
import { ReqContext } from '../../common/decorators/request-context.decorator';
import { API_VERSIONS, versionedPaths } from '../../common/versioning/versioned-resources';
import { CreateIncidentDto } from '../dto/create-incident.dto';
import { IncidentResponseDto } from '../dto/incident-response.dto';
import { ListIncidentsQueryDto } from '../dto/list-incidents-query.dto';
import { IncidentsService } from '../services/incidents.service';

@ApiTags('Incidents')
@ApiHeader({ name: 'X-Correlation-Id', required: false, description: 'Echoed on the response' })
@Controller({ path: versionedPaths('incidents'), version: API_VERSIONS.V1 })
export class IncidentsController {
  constructor(private readonly incidentsService: IncidentsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Create an incident',
    description: 'Enriches the description (severity, tags, summary) and stores the incident',
  })
  @ApiResponse({ status: 201, type: IncidentResponseDto })
  @ApiResponse({ status: 400, description: 'Validation failed' })
  async create(
    @Body() dto: CreateIncidentDto,
    @ReqContext() context: RequestContext,
    @Res({ passthrough: true }) res: Response,
  ): Promise<IncidentResponseDto> {
    const incident = await this.incidentsService.create(dto, context);
    res.location(`/incidents/${incident.id}`);
    return incident;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an incident by ID' })
  @ApiResponse({ status: 200, type: IncidentResponseDto })
  @ApiResponse({ status: 404, description: 'No incident with this ID' })
  getById(
    @Param('id', new ParseUUIDPipe()) id: string,
    @ReqContext() context: RequestContext,
  ): Promise<IncidentResponseDto> {
    return this.incidentsService.findById(id, context);
  }

  @Get()
  @ApiOperation({ summary: 'List incidents, optionally filtered by severity' })
  @ApiResponse({ status: 200, type: [IncidentResponseDto] })
  list(
    @Query() query: ListIncidentsQueryDto,
    @ReqContext() context: RequestContext,
  ): Promise<IncidentResponseDto[]> {
    return this.incidentsService.list(query.severity, context);
  }
}
