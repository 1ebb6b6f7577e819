import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EnvironmentSchema } from './config/environment.schema';
import { CommonModule } from './modules/common/common.module';
import { DiagnosticsModule } from './modules/diagnostics/diagnostics.module';
import { HealthModule } from './modules/health/health.module';
import { IncidentsModule } from './modules/incidents/incidents.module';
import { OrdersModule } from './modules/orders/orders.module';

/**
 * Root Application Module
 *
 * - Global configuration (environment variables validated with Zod)
 * - Common module (request pipeline, exception boundary)
 * - Feature modules (incidents, orders, diagnostics, health)
 */
@Module({
  imports: [
    // Later files override earlier ones: .env, then .env.{NODE_ENV}
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', `.env.${process.env.NODE_ENV || 'development'}`],
      cache: true,
      validate: (config) => EnvironmentSchema.parse(config),
    }),

    CommonModule,
    IncidentsModule,
    OrdersModule,
    DiagnosticsModule,
    HealthModule,
  ],
})
export class AppModule {}
