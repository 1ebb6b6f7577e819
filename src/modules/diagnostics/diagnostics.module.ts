import { Module } from '@nestjs/common';
import { DiagnosticsController } from './controllers/diagnostics.controller';
import { DiagnosticsService } from './services/diagnostics.service';

@Module({
  controllers: [DiagnosticsController],
  providers: [DiagnosticsService],
})
export class DiagnosticsModule {}
