import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { monitorEventLoopDelay, type IntervalHistogram } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';
import type { RequestContext } from '../../common/context/request-context';

export interface EventLoopStats {
  eventLoopDelayMs: { min: number; mean: number; p50: number; p99: number; max: number };
  memory: NodeJS.MemoryUsage;
  pid: number;
  uptimeSeconds: number;
  nodeVersion: string;
}

export interface DelayReport {
  mode: 'async' | 'sync' | 'fake-async';
  requestedDelayMs: number;
  elapsedMs: number;
  blockedEventLoop: boolean;
  correlationId: string;
}

export interface CpuBoundReport {
  iterations: number;
  result: number;
  elapsedMs: number;
  correlationId: string;
}

const NS_PER_MS = 1e6;

function blockFor(delayMs: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, delayMs);
}

function toMs(nanoseconds: number): number {
  return Math.round((nanoseconds / NS_PER_MS) * 100) / 100;
}

/**
 * Diagnostics Service
 *
 * Demonstrates how waiting differs from blocking on a single event loop: a
 * timer wait lets other requests progress, a synchronous sleep or a long
 * computation stalls every request until it returns.
 */
@Injectable()
export class DiagnosticsService implements OnModuleInit, OnModuleDestroy {
  private readonly histogram: IntervalHistogram = monitorEventLoopDelay({ resolution: 20 });

  onModuleInit(): void {
    this.histogram.enable();
  }

  onModuleDestroy(): void {
    this.histogram.disable();
  }

  eventLoopStats(): EventLoopStats {
    const { histogram } = this;
    const hasSamples = histogram.count > 0;

    return {
      eventLoopDelayMs: {
        min: hasSamples ? toMs(histogram.min) : 0,
        mean: hasSamples ? toMs(histogram.mean) : 0,
        p50: hasSamples ? toMs(histogram.percentile(50)) : 0,
        p99: hasSamples ? toMs(histogram.percentile(99)) : 0,
        max: hasSamples ? toMs(histogram.max) : 0,
      },
      memory: process.memoryUsage(),
      pid: process.pid,
      uptimeSeconds: Math.floor(process.uptime()),
      nodeVersion: process.version,
    };
  }

  /**
   * Non-blocking wait: the event loop serves other requests meanwhile
   */
  async waitAsync(delayMs: number, context: RequestContext): Promise<DelayReport> {
    const logger = context.getLogger(DiagnosticsService.name);
    logger.log('Starting non-blocking wait', { delayMs });

    await sleep(delayMs, undefined, { signal: context.signal });

    const elapsedMs = context.elapsedMs();
    logger.log('Non-blocking wait finished', { delayMs, elapsedMs });

    return {
      mode: 'async',
      requestedDelayMs: delayMs,
      elapsedMs,
      blockedEventLoop: false,
      correlationId: context.requireCorrelationId(),
    };
  }

  /**
   * Blocking wait: nothing else runs on this process until it returns
   */
  waitSync(delayMs: number, context: RequestContext): DelayReport {
    const logger = context.getLogger(DiagnosticsService.name);
    logger.warn('Blocking the event loop', { delayMs });

    blockFor(delayMs);

    return {
      mode: 'sync',
      requestedDelayMs: delayMs,
      elapsedMs: context.elapsedMs(),
      blockedEventLoop: true,
      correlationId: context.requireCorrelationId(),
    };
  }

  /**
   * Blocking wait behind an `async` signature
   *
   * The sleep runs in a promise callback, which still executes on the event
   * loop: awaiting it does not let other requests progress.
   */
  async waitFakeAsync(delayMs: number, context: RequestContext): Promise<DelayReport> {
    const logger = context.getLogger(DiagnosticsService.name);
    logger.warn('Blocking the event loop inside an async call', { delayMs });

    await Promise.resolve().then(() => blockFor(delayMs));

    return {
      mode: 'fake-async',
      requestedDelayMs: delayMs,
      elapsedMs: context.elapsedMs(),
      blockedEventLoop: true,
      correlationId: context.requireCorrelationId(),
    };
  }

  cpuBound(iterations: number, context: RequestContext): CpuBoundReport {
    const startedAt = Date.now();

    let result = 0;
    for (let i = 0; i < iterations; i++) {
      result += Math.sqrt(i);
    }

    const elapsedMs = Date.now() - startedAt;
    context.getLogger(DiagnosticsService.name).log('CPU-bound work finished', {
      iterations,
      elapsedMs,
    });

    return {
      iterations,
      result,
      elapsedMs,
      correlationId: context.requireCorrelationId(),
    };
  }
}
