// Re-export public API
export { PersistenceModule } from './persistence.module';
export { TypeOrmPointWriter } from './typeorm-point.writer';
export { HistoryService } from './history.service';
export type { HistoryPoint } from './history.service';
export { BmsReading } from './entities/bms-reading.entity';
export { POINT_WRITER } from './interfaces/point-writer.interface';
export type {
  PointWriter,
  WriteResult,
} from './interfaces/point-writer.interface';
