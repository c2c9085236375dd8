import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConvergenceModule } from '../convergence/convergence.module';
import { ConvergenceBatchProcessor } from './processors/convergence-batch.processor';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';
import { CONVERGENCE_BATCH_QUEUE } from './jobs.constants';

@Module({
  imports: [
    BullModule.registerQueue({ name: CONVERGENCE_BATCH_QUEUE }),
    ConvergenceModule,
  ],
  controllers: [JobsController],
  providers: [JobsService, ConvergenceBatchProcessor],
  exports: [JobsService],
})
export class JobsModule {}
