import { redisConnectionFromUrl } from './queue.module';

describe('redisConnectionFromUrl', () => {
  it('should parse a TCP URL with password', () => {
    expect(redisConnectionFromUrl('redis://:test-secret@cache:6380')).toEqual({
      host: 'cache',
      port: 6380,
      password: 'test-secret',
    });
  });

  it('should default the port to 6379', () => {
    expect(redisConnectionFromUrl('redis://localhost')).toEqual({
      host: 'localhost',
      port: 6379,
    });
  });

  it('should treat an absolute path as a unix socket', () => {
    expect(redisConnectionFromUrl('/tmp/redis.sock')).toEqual({
      path: '/tmp/redis.sock',
    });
  });
});
