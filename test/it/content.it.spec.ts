import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from '../../src/app.controller';
import { ContactController } from '../../src/modules/contact/contact.controller';
import { ContactModule } from '../../src/modules/contact/contact.module';
import { EventController } from '../../src/modules/event/event.controller';
import { EventModule } from '../../src/modules/event/event.module';
import { OwnerController } from '../../src/modules/owner/owner.controller';
import { OwnerModule } from '../../src/modules/owner/owner.module';
import { SeedController } from '../../src/modules/seed/seed.controller';
import { SeedModule } from '../../src/modules/seed/seed.module';
import { TheaterController } from '../../src/modules/theater/theater.controller';
import { TheaterModule } from '../../src/modules/theater/theater.module';
import { VideoController } from '../../src/modules/video/video.controller';
import { VideoModule } from '../../src/modules/video/video.module';
import { InMemoryDocumentStore } from '../support/in-memory-document-store';
import { TestStoreModule } from '../support/test-store.module';

describe('Site content', () => {
  let moduleRef: TestingModule;
  let store: InMemoryDocumentStore;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    store = new InMemoryDocumentStore();

    moduleRef = await Test.createTestingModule({
      imports: [
        TestStoreModule.register(store),
        EventModule,
        OwnerModule,
        TheaterModule,
        ContactModule,
        VideoModule,
        SeedModule,
      ],
      controllers: [AppController],
    }).compile();
  });

  afterEach(async () => {
    await moduleRef.close();
    jest.restoreAllMocks();
  });

  it('answers the root route with a banner', () => {
    expect(moduleRef.get(AppController).getRoot()).toEqual({
      message: 'Cabaret Theater API running',
    });
  });

  describe('before seeding', () => {
    it('serves empty content', async () => {
      await expect(moduleRef.get(EventController).listEvents()).resolves.toEqual([]);
      await expect(moduleRef.get(OwnerController).listOwners()).resolves.toEqual([]);
      await expect(moduleRef.get(TheaterController).getTheater()).resolves.toBeNull();
      await expect(moduleRef.get(VideoController).getCurrentVideo()).resolves.toBeNull();
    });
  });

  describe('after seeding', () => {
    beforeEach(async () => {
      await expect(moduleRef.get(SeedController).seed()).resolves.toEqual({
        status: 'ok',
        message: 'Seeded demo data',
      });
    });

    it('lists the demo program in date order', async () => {
      // when
      const events = await moduleRef.get(EventController).listEvents();

      // then
      const times = events.map((event) => event.date.getTime());
      expect(times).toEqual([...times].sort((a, b) => a - b));
      expect(events.map((event) => event.genre).sort()).toEqual(['Impro', 'Kabarett', 'Workshop']);
      expect(events.every((event) => event.seats_available === event.seats_total)).toBe(true);
    });

    it('serves the owners, the theater and a video', async () => {
      // when
      const owners = await moduleRef.get(OwnerController).listOwners();
      const theater = await moduleRef.get(TheaterController).getTheater();
      const video = await moduleRef.get(VideoController).getCurrentVideo();

      // then
      expect(owners.map((owner) => owner.name).sort()).toEqual([
        'Jonas Petrović',
        'Resi Hofbauer',
      ]);
      expect(theater).toMatchObject({ name: 'Kleinkunstbühne am Naschmarkt' });
      expect(video).toMatchObject({ caption: 'Aus dem aktuellen Programm' });
    });

    it('does not duplicate content when seeded again', async () => {
      // when
      const result = await moduleRef.get(SeedController).seed();

      // then
      expect(result).toEqual({ status: 'ok', message: 'Already seeded' });
      await expect(store.count('event')).resolves.toBe(3);
      await expect(store.count('ownerprofile')).resolves.toBe(2);
    });
  });

  it('serves the latest theater record', async () => {
    // given
    const theater = {
      tagline: 'Test tagline',
      story: 'Test story',
      address: 'Teststraße 1',
      phone: '+43 1 000 00 00',
      email: 'info@example.com',
    };
    await store.create('theater', { ...theater, name: 'Old Stage' });
    await store.create('theater', { ...theater, name: 'New Stage' });

    // when & then
    await expect(moduleRef.get(TheaterController).getTheater()).resolves.toMatchObject({
      name: 'New Stage',
    });
  });

  it('stores contact messages', async () => {
    // when
    const result = await moduleRef.get(ContactController).submitMessage({
      name: 'Test Guest',
      email: 'guest@example.com',
      subject: 'Group visit',
      message: 'Do you offer group prices?',
    });

    // then
    expect(result.message).toBe('Thanks for reaching out!');
    expect(store.all('contactmessage')).toEqual([
      expect.objectContaining({
        id: result.message_id,
        subject: 'Group visit',
        message: 'Do you offer group prices?',
      }),
    ]);
  });

  it('looks up a video by exact month', async () => {
    // given
    await store.create('video', {
      month_key: '2031-03',
      video_url: 'https://videos.example.com/2031-03.mp4',
    });

    // when
    const controller = moduleRef.get(VideoController);

    // then
    await expect(controller.getVideoByMonth('2031-03')).resolves.toMatchObject({
      video_url: 'https://videos.example.com/2031-03.mp4',
    });
    await expect(controller.getVideoByMonth('2031-04')).resolves.toBeNull();
  });
});
