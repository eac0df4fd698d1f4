import { Inject, Injectable } from '@nestjs/common';
import { DOCUMENT_STORE } from '../store/store.constants';
import {
  DocumentStore,
  StoredRecord,
} from '../store/interfaces/document-store.interface';
import { Event } from './event.schema';

/**
 * EventService exposes the program of upcoming shows
 */
@Injectable()
export class EventService {
  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
  ) {}

  /**
   * All events, earliest first.
   * Runs a fresh query on every call.
   */
  async listEvents(): Promise<StoredRecord<Event>[]> {
    const events: StoredRecord<Event>[] = [];
    for await (const event of this.store.find('event', undefined, { date: 1 })) {
      events.push(event);
    }
    return events;
  }
}
