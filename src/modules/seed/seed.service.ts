import { Inject, Injectable, Logger } from '@nestjs/common';
import { DOCUMENT_STORE } from '../store/store.constants';
import { DocumentStore } from '../store/interfaces/document-store.interface';
import { buildDemoContent } from './demo-content';

export interface SeedResult {
  status: 'ok';
  message: string;
}

/**
 * SeedService populates an empty database with demo content
 *
 * Idempotent: does nothing once any event exists.
 */
@Injectable()
export class SeedService {
  private readonly logger = new Logger(SeedService.name);

  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
  ) {}

  async seed(now: Date = new Date()): Promise<SeedResult> {
    if ((await this.store.count('event')) > 0) {
      this.logger.log('Events already present, skipping seed');
      return { status: 'ok', message: 'Already seeded' };
    }

    const content = buildDemoContent(now);

    await this.store.create('theater', content.theater);

    for (const owner of content.owners) {
      await this.store.create('ownerprofile', owner);
    }

    for (const event of content.events) {
      await this.store.create('event', event);
    }

    await this.store.create('video', content.video);

    this.logger.log(
      `Seeded 1 theater, ${content.owners.length} owners, ${content.events.length} events and the video for ${content.video.month_key}`,
    );

    return { status: 'ok', message: 'Seeded demo data' };
  }
}
