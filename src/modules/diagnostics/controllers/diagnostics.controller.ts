import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RequestContext } from '../../common/context/request-context';
import { ReqContext } from '../../common/decorators/request-context.decorator';
import { CpuBoundQueryDto, DelayQueryDto } from '../dto/diagnostics-query.dto';
import {
  DiagnosticsService,
  type CpuBoundReport,
  type DelayReport,
  type EventLoopStats,
} from '../services/diagnostics.service';

@ApiTags('Diagnostics')
@Controller('diagnostics')
export class DiagnosticsController {
  constructor(private readonly diagnosticsService: DiagnosticsService) {}

  @Get('event-loop')
  @ApiOperation({ summary: 'Event-loop delay, memory usage and process info' })
  @ApiResponse({ status: 200, description: 'Current process statistics' })
  eventLoop(): EventLoopStats {
    return this.diagnosticsService.eventLoopStats();
  }

  @Get('slow-async')
  @ApiOperation({
    summary: 'Non-blocking wait',
    description: 'Waits on a timer; concurrent calls complete in about one delay',
  })
  slowAsync(
    @Query() query: DelayQueryDto,
    @ReqContext() context: RequestContext,
  ): Promise<DelayReport> {
    return this.diagnosticsService.waitAsync(query.delayMs, context);
  }

  @Get('slow-sync')
  @ApiOperation({
    summary: 'Blocking wait',
    description: 'Blocks the event loop; concurrent calls complete one after another',
  })
  slowSync(@Query() query: DelayQueryDto, @ReqContext() context: RequestContext): DelayReport {
    return this.diagnosticsService.waitSync(query.delayMs, context);
  }

  @Get('slow-fake-async')
  @ApiOperation({
    summary: 'Blocking wait behind an async signature',
    description: 'Returns a promise but still blocks the event loop; concurrent calls complete one after another',
  })
  slowFakeAsync(
    @Query() query: DelayQueryDto,
    @ReqContext() context: RequestContext,
  ): Promise<DelayReport> {
    return this.diagnosticsService.waitFakeAsync(query.delayMs, context);
  }

  @Get('cpu-bound')
  @ApiOperation({ summary: 'Synchronous CPU-bound computation' })
  cpuBound(
    @Query() query: CpuBoundQueryDto,
    @ReqContext() context: RequestContext,
  ): CpuBoundReport {
    return this.diagnosticsService.cpuBound(query.iterations, context);
  }
}
