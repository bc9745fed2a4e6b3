export {
  DEFAULT_REDIS_CHANNEL_PREFIX,
  RedisChannel,
  redisChannelName,
  type RedisChannelOptions,
  type RedisPublisher
} from "./redis-channel.js";
