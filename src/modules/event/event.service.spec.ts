import { EventService } from './event.service';
import { InMemoryDocumentStore } from '../../../test/support/in-memory-document-store';
import { buildEvent } from '../../../test/support/fixtures';

describe('EventService', () => {
  let store: InMemoryDocumentStore;
  let service: EventService;

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    service = new EventService(store);
  });

  it('lists events earliest first', async () => {
    // given
    await store.create('event', buildEvent({ title: 'Late', date: new Date('2031-03-20T19:00:00.000Z') }));
    await store.create('event', buildEvent({ title: 'Early', date: new Date('2031-03-01T19:00:00.000Z') }));
    await store.create('event', buildEvent({ title: 'Middle', date: new Date('2031-03-10T19:00:00.000Z') }));

    // when
    const events = await service.listEvents();

    // then
    expect(events.map((event) => event.title)).toEqual(['Early', 'Middle', 'Late']);
    expect(events[0].id).toMatch(/^[0-9a-f]{24}$/);
  });

  it('returns an empty list when there are no events', async () => {
    await expect(service.listEvents()).resolves.toEqual([]);
  });

  it('reads the current state on every call', async () => {
    // given
    await store.create('event', buildEvent({ title: 'First' }));
    const before = await service.listEvents();

    // when
    await store.create('event', buildEvent({ title: 'Second', date: new Date('2031-12-31T19:00:00.000Z') }));
    const after = await service.listEvents();

    // then
    expect(before).toHaveLength(1);
    expect(after.map((event) => event.title)).toEqual(['First', 'Second']);
  });
});
