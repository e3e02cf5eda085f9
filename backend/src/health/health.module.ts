import { Module } from '@nestjs/common';
import { LiveModule } from '../live';
import { HealthController } from './health.controller';

@Module({
  imports: [LiveModule],
  controllers: [HealthController],
})
export class HealthModule {}
