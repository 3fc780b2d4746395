import IORedis from 'ioredis';

// Options BullMQ requires for blocking worker connections
export function createRedisConnection(url: string) {
  return new IORedis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
  });
}
