import Redis from "ioredis";

// BullMQ workers block on Redis, which requires maxRetriesPerRequest to be null.
export const createRedisConnection = (url: string) => new Redis(url, { maxRetriesPerRequest: null });
