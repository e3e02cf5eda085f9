import { Module } from '@nestjs/common';
import { ConditionalModule, ConfigModule } from '@nestjs/config';
import { collectorConfig } from './config/collector.config';
import { HealthModule } from './health/health.module';
import { LiveModule } from './live';
import { PersistenceModule } from './persistence';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      load: [collectorConfig],
    }),
    // History sink only when a database is configured
    ConditionalModule.registerWhen(PersistenceModule, 'DB_HOST'),
    LiveModule,
    HealthModule,
  ],
})
export class AppModule {}
