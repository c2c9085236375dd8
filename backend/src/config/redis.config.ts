import { QueueOptions } from 'bullmq';

export const redisConfig = (): Pick<QueueOptions, 'connection'> => ({
  connection: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
  },
});
