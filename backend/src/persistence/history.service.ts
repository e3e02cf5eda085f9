import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, Repository } from 'typeorm';
import { collectorConfig } from '../config/collector.config';
import { BmsReading } from './entities/bms-reading.entity';

/**
 * One stored reading, as served to the history chart.
 */
export interface HistoryPoint {
  timestamp: Date;
  value: number;
}

/** Window used when the caller gives no start date. */
const DEFAULT_WINDOW_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class HistoryService {
  private readonly logger = new Logger(HistoryService.name);

  constructor(
    @Inject(collectorConfig.KEY)
    private readonly config: ConfigType<typeof collectorConfig>,
    @InjectRepository(BmsReading)
    private readonly readingRepository: Repository<BmsReading>,
  ) {}

  /**
   * Readings for one label of this installation, oldest first.
   *
   * Without `start`, returns the 24 hours before `end` (default: now).
   */
  async getHistory(
    label: string,
    start?: Date,
    end?: Date,
  ): Promise<HistoryPoint[]> {
    const endDate = end ?? new Date();
    const startDate = start ?? new Date(endDate.getTime() - DEFAULT_WINDOW_MS);

    this.logger.debug(
      `Fetching history for ${label} from ${startDate.toISOString()} to ${endDate.toISOString()}`,
    );

    const readings = await this.readingRepository.find({
      select: ['timestamp', 'value'],
      where: {
        installationId: this.config.installationId,
        label,
        timestamp: Between(startDate, endDate),
      },
      order: { timestamp: 'ASC' },
    });

    return readings.map((reading) => ({
      timestamp: reading.timestamp,
      value: reading.value,
    }));
  }

  /**
   * Distinct labels stored for this installation.
   */
  async getLabels(): Promise<string[]> {
    const rows = await this.readingRepository
      .createQueryBuilder('reading')
      .select('DISTINCT reading.label', 'label')
      .where('reading.installationId = :installationId', {
        installationId: this.config.installationId,
      })
      .orderBy('label', 'ASC')
      .getRawMany<{ label: string }>();

    return rows.map((row) => row.label);
  }
}
