import {
  Entity,
  Column,
  PrimaryColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

/**
 * BmsReading Entity - permanent history of polled BMS points
 *
 * One row per PointRecord. Rows are append-only: the collector never
 * updates or deduplicates, so two polls reporting the same
 * label+timestamp produce two rows.
 *
 * Category columns are denormalized from the label so dashboards can
 * group by plant (system) or location (line/outstation) without parsing
 * labels in SQL.
 */
@Entity('bms_readings')
@Index('idx_bms_readings_label_timestamp', [
  'installationId',
  'label',
  'timestamp',
])
export class BmsReading {
  /**
   * Record id generated by the collector (UUID).
   */
  @PrimaryColumn({ type: 'uuid' })
  id!: string;

  /**
   * Observation time reported by the BMS (UTC).
   */
  @Index('idx_bms_readings_timestamp')
  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  /**
   * Installation/building tag.
   */
  @Column({ type: 'varchar', length: 64 })
  installationId!: string;

  /**
   * Normalized point label, e.g. "L11_O11_D1_ChW Sec Pump1 Speed".
   */
  @Column({ type: 'varchar', length: 255 })
  label!: string;

  /**
   * Point path as reported by the BMS, e.g. "/rest/L11OS11D1_ChW Sec Pump1 Speed".
   */
  @Column({ type: 'varchar', length: 255 })
  sourcePath!: string;

  @Column({ type: 'double precision' })
  value!: number;

  @Column({ type: 'varchar', length: 32 })
  system!: string;

  @Column({ type: 'varchar', length: 32 })
  measurementType!: string;

  @Column({ type: 'varchar', length: 16 })
  line!: string;

  @Column({ type: 'varchar', length: 16 })
  outstation!: string;

  /**
   * Row creation timestamp for auditing.
   */
  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
