import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { HealthService } from './health.service';
import { HealthController } from './health.controller';
import { CONVERGENCE_BATCH_QUEUE } from '../jobs/jobs.constants';

@Module({
  imports: [
    // Register queues to enable injection
    BullModule.registerQueue({ name: CONVERGENCE_BATCH_QUEUE }),
  ],
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService],
})
export class HealthModule {}
