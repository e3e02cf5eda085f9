import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { collectorConfig } from '../config/collector.config';
import { databaseConfig } from '../config/database.config';
import { BmsReading } from './entities/bms-reading.entity';
import { HistoryController } from './history.controller';
import { HistoryService } from './history.service';
import { POINT_WRITER } from './interfaces/point-writer.interface';
import { TypeOrmPointWriter } from './typeorm-point.writer';

/**
 * PersistenceModule
 *
 * Permanent history in PostgreSQL. Loaded by AppModule only when DB_HOST
 * is set; global so the poller can resolve POINT_WRITER without
 * importing it.
 *
 * Components:
 * - TypeOrmPointWriter: bound to POINT_WRITER, appends every polled batch
 * - HistoryService / HistoryController: read endpoints over stored readings
 */
@Global()
@Module({
  imports: [
    ConfigModule.forFeature(collectorConfig),
    TypeOrmModule.forRootAsync({
      imports: [
        ConfigModule.forFeature(databaseConfig),
        ConfigModule.forFeature(collectorConfig),
      ],
      useFactory: (
        database: ConfigType<typeof databaseConfig>,
        collector: ConfigType<typeof collectorConfig>,
      ) => ({
        type: 'postgres',
        host: database.host,
        port: database.port,
        username: database.username,
        password: database.password,
        database: database.database,
        entities: [BmsReading],
        synchronize: true, // Disable in production
        logging: database.logging,
        // pg pool and per-query limits; a write never outlives a poll cycle
        extra: {
          connectionTimeoutMillis: 5000,
          statement_timeout: collector.requestTimeoutMs,
          query_timeout: collector.requestTimeoutMs,
        },
      }),
      inject: [databaseConfig.KEY, collectorConfig.KEY],
    }),
    TypeOrmModule.forFeature([BmsReading]),
  ],
  controllers: [HistoryController],
  providers: [
    HistoryService,
    TypeOrmPointWriter,
    { provide: POINT_WRITER, useExisting: TypeOrmPointWriter },
  ],
  exports: [POINT_WRITER, HistoryService],
})
export class PersistenceModule {}
