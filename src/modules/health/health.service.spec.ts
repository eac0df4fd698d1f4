import { Logger } from '@nestjs/common';
import { Connection } from 'mongoose';
import { HealthService } from './health.service';

describe('HealthService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports MongoDB as down while disconnected', async () => {
    // given
    const service = new HealthService({ readyState: 0 } as unknown as Connection);

    // when
    const result = await service.check();

    // then
    expect(result.status).toBe('error');
    expect(result.services.mongodb).toEqual({
      status: 'down',
      state: 'disconnected',
      error: 'Connection state: disconnected',
    });
    expect(service.isReady()).toBe(false);
  });

  it('pings the database and lists its collections when connected', async () => {
    // given
    const ping = jest.fn().mockResolvedValue({ ok: 1 });
    const connection = {
      readyState: 1,
      name: 'cabaret-theater',
      db: {
        admin: () => ({ ping }),
        listCollections: () => ({
          toArray: jest.fn().mockResolvedValue([{ name: 'video' }, { name: 'event' }]),
        }),
      },
    };
    const service = new HealthService(connection as unknown as Connection);

    // when
    const result = await service.check();

    // then
    expect(ping).toHaveBeenCalledTimes(1);
    expect(result.status).toBe('ok');
    expect(result.services.mongodb).toMatchObject({
      status: 'up',
      state: 'connected',
      database: 'cabaret-theater',
      collections: ['event', 'video'],
    });
    expect(service.isReady()).toBe(true);
  });

  it('reports a failed ping as down', async () => {
    // given
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
    const connection = {
      readyState: 1,
      db: {
        admin: () => ({ ping: jest.fn().mockRejectedValue(new Error('not primary')) }),
      },
    };
    const service = new HealthService(connection as unknown as Connection);

    // when
    const result = await service.check();

    // then
    expect(result.status).toBe('error');
    expect(result.services.mongodb).toMatchObject({
      status: 'down',
      state: 'connected',
      error: 'not primary',
    });
  });
});
