import { Inject, Injectable } from '@nestjs/common';
import { DOCUMENT_STORE } from '../store/store.constants';
import {
  DocumentStore,
  StoredRecord,
} from '../store/interfaces/document-store.interface';
import { OwnerProfile } from './owner-profile.schema';

@Injectable()
export class OwnerService {
  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
  ) {}

  // No particular order
  async listOwners(): Promise<StoredRecord<OwnerProfile>[]> {
    const owners: StoredRecord<OwnerProfile>[] = [];
    for await (const owner of this.store.find('ownerprofile')) {
      owners.push(owner);
    }
    return owners;
  }
}
