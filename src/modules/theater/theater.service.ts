import { Inject, Injectable } from '@nestjs/common';
import { DOCUMENT_STORE } from '../store/store.constants';
import {
  DocumentStore,
  StoredRecord,
} from '../store/interfaces/document-store.interface';
import { Theater } from './theater.schema';

@Injectable()
export class TheaterService {
  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
  ) {}

  /**
   * The most recently created theater record, or null if there is none
   */
  async getLatestTheater(): Promise<StoredRecord<Theater> | null> {
    return this.store.findOne('theater', undefined, { createdAt: -1 });
  }
}
