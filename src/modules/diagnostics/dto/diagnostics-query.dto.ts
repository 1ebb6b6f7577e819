import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const MAX_DIAGNOSTIC_DELAY_MS = 30000;
export const MAX_CPU_ITERATIONS = 100_000_000;

export class DelayQueryDto {
  @ApiPropertyOptional({ minimum: 0, maximum: MAX_DIAGNOSTIC_DELAY_MS, default: 1000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'delayMs must be an integer.' })
  @Min(0, { message: `delayMs must be between 0 and ${MAX_DIAGNOSTIC_DELAY_MS}.` })
  @Max(MAX_DIAGNOSTIC_DELAY_MS, { message: `delayMs must be between 0 and ${MAX_DIAGNOSTIC_DELAY_MS}.` })
  delayMs: number = 1000;
}

export class CpuBoundQueryDto {
  @ApiPropertyOptional({ minimum: 1, maximum: MAX_CPU_ITERATIONS, default: 1_000_000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'iterations must be an integer.' })
  @Min(1, { message: `iterations must be between 1 and ${MAX_CPU_ITERATIONS}.` })
  @Max(MAX_CPU_ITERATIONS, { message: `iterations must be between 1 and ${MAX_CPU_ITERATIONS}.` })
  iterations: number = 1_000_000;
}
