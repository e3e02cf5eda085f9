import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  Param,
  Query,
} from '@nestjs/common';
import { HistoryPoint, HistoryService } from './history.service';

/**
 * Query parameters for the history endpoint
 */
interface HistoryQuery {
  start?: string;
  end?: string;
}

/**
 * HistoryController
 *
 * Read endpoints over the permanent history. Registered only when the
 * PostgreSQL sink is enabled.
 *
 * Endpoints:
 * - GET /history - Labels stored for this installation
 * - GET /history/:label - Readings for a label within a date range
 */
@Controller('history')
export class HistoryController {
  private readonly logger = new Logger(HistoryController.name);

  constructor(private readonly historyService: HistoryService) {}

  @Get()
  async getLabels(): Promise<{ labels: string[] }> {
    const labels = await this.historyService.getLabels();
    return { labels };
  }

  /**
   * @param label - Normalized point label
   * @param query - Optional date range (start, end as ISO strings)
   *
   * @example
   * GET /history/L11_O11_D1_ChW%20Sec%20Pump1%20Speed?start=2026-01-07T00:00:00Z
   */
  @Get(':label')
  async getHistory(
    @Param('label') label: string,
    @Query() query: HistoryQuery,
  ): Promise<{ label: string; readings: HistoryPoint[] }> {
    this.logger.log(
      `GET /history/${label} with query: ${JSON.stringify(query)}`,
    );

    const start = this.parseDate('start', query.start);
    const end = this.parseDate('end', query.end);
    if (start && end && start > end) {
      throw new BadRequestException('start must not be after end');
    }

    const readings = await this.historyService.getHistory(label, start, end);
    return { label, readings };
  }

  private parseDate(name: string, value?: string): Date | undefined {
    if (!value) {
      return undefined;
    }
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      throw new BadRequestException(`Invalid ${name} date: ${value}`);
    }
    return date;
  }
}
