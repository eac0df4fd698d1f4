import { Inject, Injectable } from '@nestjs/common';
import { DOCUMENT_STORE } from '../store/store.constants';
import {
  DocumentStore,
  StoredRecord,
} from '../store/interfaces/document-store.interface';
import { Video } from './video.schema';
import { isMonthKey, toMonthKey } from './month-key';

/**
 * VideoService selects the background video for a month
 */
@Injectable()
export class VideoService {
  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
  ) {}

  /**
   * Video for the month containing `now`, falling back to the most
   * recently created video. Null only when no video exists at all.
   */
  async getCurrentVideo(now: Date = new Date()): Promise<StoredRecord<Video> | null> {
    const video = await this.getVideoByMonth(toMonthKey(now));
    if (video) {
      return video;
    }

    return this.store.findOne('video', undefined, { createdAt: -1 });
  }

  /**
   * Exact month lookup, no fallback. A key that is not "YYYY-MM" cannot
   * match a stored video and resolves to null without a query.
   */
  async getVideoByMonth(monthKey: string): Promise<StoredRecord<Video> | null> {
    if (!isMonthKey(monthKey)) {
      return null;
    }

    return this.store.findOne('video', { month_key: monthKey });
  }
}
