import { VideoService } from './video.service';
import { InMemoryDocumentStore } from '../../../test/support/in-memory-document-store';

describe('VideoService', () => {
  let store: InMemoryDocumentStore;
  let service: VideoService;

  const addVideo = (monthKey: string) =>
    store.create('video', {
      month_key: monthKey,
      video_url: `https://videos.example.com/${monthKey}.mp4`,
    });

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    service = new VideoService(store);
  });

  describe('getCurrentVideo', () => {
    it('prefers the video for the current month over newer ones', async () => {
      // given
      await addVideo('2031-03');
      await addVideo('2031-04');

      // when
      const video = await service.getCurrentVideo(new Date('2031-03-15T12:00:00.000Z'));

      // then
      expect(video?.month_key).toBe('2031-03');
      expect(video?.video_url).toBe('https://videos.example.com/2031-03.mp4');
    });

    it('falls back to the most recently created video', async () => {
      // given
      await addVideo('2031-02');
      await addVideo('2031-01');

      // when
      const video = await service.getCurrentVideo(new Date('2031-05-01T00:00:00.000Z'));

      // then
      expect(video?.month_key).toBe('2031-01');
    });

    it('resolves the month in UTC', async () => {
      // given
      await addVideo('2031-03');
      await addVideo('2031-04');
      await addVideo('2031-02');

      // when
      const video = await service.getCurrentVideo(
        new Date('2031-03-31T23:30:00.000-02:00'),
      );

      // then
      expect(video?.month_key).toBe('2031-04');
    });

    it('returns null when no video exists', async () => {
      await expect(service.getCurrentVideo()).resolves.toBeNull();
    });
  });

  describe('getVideoByMonth', () => {
    it('returns only an exact match', async () => {
      // given
      await addVideo('2031-02');

      // when & then
      await expect(service.getVideoByMonth('2031-02')).resolves.toMatchObject({
        month_key: '2031-02',
      });
      await expect(service.getVideoByMonth('2031-05')).resolves.toBeNull();
    });

    it('resolves a malformed month key to null without querying', async () => {
      // given
      await addVideo('2031-03');
      const findOne = jest.spyOn(store, 'findOne');

      // when & then
      await expect(service.getVideoByMonth('2031-3')).resolves.toBeNull();
      await expect(service.getVideoByMonth('march')).resolves.toBeNull();
      expect(findOne).not.toHaveBeenCalled();
    });
  });
});
