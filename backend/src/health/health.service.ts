import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { CONVERGENCE_BATCH_QUEUE } from '../jobs/jobs.constants';

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    redis: {
      status: 'up' | 'down';
      responseTime?: number;
      error?: string;
    };
  };
  queues: {
    [queueName: string]: QueueStats;
  };
}

const EMPTY_QUEUE_STATS: QueueStats = {
  waiting: 0,
  active: 0,
  completed: 0,
  failed: 0,
  delayed: 0,
};

@Injectable()
export class HealthService {
  private startTime: number;

  constructor(
    @InjectQueue(CONVERGENCE_BATCH_QUEUE) private batchQueue: Queue,
  ) {
    this.startTime = Date.now();
  }

  async checkHealth(): Promise<HealthCheckResult> {
    const checks = {
      redis: await this.checkRedis(),
    };

    const queues = await this.getQueueStats();

    return {
      status: checks.redis.status === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000), // seconds
      checks,
      queues,
    };
  }

  private async checkRedis(): Promise<HealthCheckResult['checks']['redis']> {
    try {
      const start = Date.now();
      // Queue counts go through Redis, so this fails when Redis is down
      await this.batchQueue.getWaitingCount();
      const responseTime = Date.now() - start;

      return {
        status: 'up',
        responseTime,
      };
    } catch (error) {
      return {
        status: 'down',
        error: error instanceof Error ? error.message : 'Redis connection failed',
      };
    }
  }

  private async getQueueStats(): Promise<HealthCheckResult['queues']> {
    const queues: Record<string, Queue> = {
      [CONVERGENCE_BATCH_QUEUE]: this.batchQueue,
    };

    const stats: HealthCheckResult['queues'] = {};

    for (const [name, queue] of Object.entries(queues)) {
      try {
        const [waiting, active, completed, failed, delayed] = await Promise.all([
          queue.getWaitingCount(),
          queue.getActiveCount(),
          queue.getCompletedCount(),
          queue.getFailedCount(),
          queue.getDelayedCount(),
        ]);

        stats[name] = {
          waiting,
          active,
          completed,
          failed,
          delayed,
        };
      } catch {
        // Redis status already reports the failure
        stats[name] = { ...EMPTY_QUEUE_STATS };
      }
    }

    return stats;
  }

  async getPrometheusMetrics(): Promise<string> {
    const health = await this.checkHealth();

    const metrics: string[] = [];

    metrics.push(`# HELP horizon_health_status Health status of the application (1 = healthy, 0 = unhealthy)`);
    metrics.push(`# TYPE horizon_health_status gauge`);
    metrics.push(`horizon_health_status{status="${health.status}"} ${health.status === 'healthy' ? 1 : 0}`);

    metrics.push(`# HELP horizon_uptime_seconds Application uptime in seconds`);
    metrics.push(`# TYPE horizon_uptime_seconds gauge`);
    metrics.push(`horizon_uptime_seconds ${health.uptime}`);

    metrics.push(`# HELP horizon_redis_status Redis connection status (1 = up, 0 = down)`);
    metrics.push(`# TYPE horizon_redis_status gauge`);
    metrics.push(`horizon_redis_status ${health.checks.redis.status === 'up' ? 1 : 0}`);
    if (health.checks.redis.responseTime !== undefined) {
      metrics.push(`# HELP horizon_redis_response_time_ms Redis response time in milliseconds`);
      metrics.push(`# TYPE horizon_redis_response_time_ms gauge`);
      metrics.push(`horizon_redis_response_time_ms ${health.checks.redis.responseTime}`);
    }

    metrics.push(`# HELP horizon_queue_jobs Queue job counts`);
    metrics.push(`# TYPE horizon_queue_jobs gauge`);
    for (const [queueName, stats] of Object.entries(health.queues)) {
      metrics.push(`horizon_queue_jobs{queue="${queueName}",state="waiting"} ${stats.waiting}`);
      metrics.push(`horizon_queue_jobs{queue="${queueName}",state="active"} ${stats.active}`);
      metrics.push(`horizon_queue_jobs{queue="${queueName}",state="completed"} ${stats.completed}`);
      metrics.push(`horizon_queue_jobs{queue="${queueName}",state="failed"} ${stats.failed}`);
      metrics.push(`horizon_queue_jobs{queue="${queueName}",state="delayed"} ${stats.delayed}`);
    }

    return metrics.join('\n') + '\n';
  }
}
