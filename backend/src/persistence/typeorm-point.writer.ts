import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { PointRecord, SinkUnavailableError } from '../bms';
import { BmsReading } from './entities/bms-reading.entity';
import { PointWriter, WriteResult } from './interfaces/point-writer.interface';

/**
 * TypeOrmPointWriter - appends polled records to PostgreSQL
 *
 * - Inserts in chunks of BATCH_SIZE rows, all inside one transaction, so a
 *   batch is either fully stored or not at all.
 * - Plain INSERT: no upsert, no dedup.
 * - Any driver failure surfaces as SinkUnavailableError. The poller logs it
 *   and drops the batch; there is no local retry queue.
 */
@Injectable()
export class TypeOrmPointWriter implements PointWriter {
  private readonly logger = new Logger(TypeOrmPointWriter.name);
  private readonly BATCH_SIZE = 1000;

  readonly name = 'postgres';

  constructor(
    @InjectRepository(BmsReading)
    private readonly readingRepository: Repository<BmsReading>,
  ) {}

  async write(records: readonly PointRecord[]): Promise<WriteResult> {
    if (records.length === 0) {
      return { written: 0 };
    }

    const rows = records.map((record) => this.toRow(record));

    try {
      await this.readingRepository.manager.transaction(async (manager) => {
        for (let offset = 0; offset < rows.length; offset += this.BATCH_SIZE) {
          await manager.insert(
            BmsReading,
            rows.slice(offset, offset + this.BATCH_SIZE),
          );
        }
      });
    } catch (error) {
      this.logger.error('Batch insert failed', {
        batchSize: rows.length,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new SinkUnavailableError(
        `Failed to store ${rows.length} reading(s)`,
        { cause: error },
      );
    }

    this.logger.debug(`Stored ${rows.length} reading(s)`);
    return { written: rows.length };
  }

  private toRow(record: PointRecord): QueryDeepPartialEntity<BmsReading> {
    return {
      id: record.id,
      timestamp: record.timestamp,
      installationId: record.installationId,
      label: record.label,
      sourcePath: record.sourcePath,
      value: record.value,
      system: record.category.system,
      measurementType: record.category.measurementType,
      line: record.category.line,
      outstation: record.category.outstation,
    };
  }
}
