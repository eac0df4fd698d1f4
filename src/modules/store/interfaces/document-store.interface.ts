import { FilterQuery, SortOrder, UpdateQuery } from 'mongoose';
import { Event } from '../../event/event.schema';
import { Reservation } from '../../reservation/reservation.schema';
import { OwnerProfile } from '../../owner/owner-profile.schema';
import { Theater } from '../../theater/theater.schema';
import { ContactMessage } from '../../contact/contact-message.schema';
import { Video } from '../../video/video.schema';

/**
 * Entity type stored in each collection.
 * Collection names are the lowercased entity names.
 */
export interface CollectionEntityMap {
  event: Event;
  reservation: Reservation;
  ownerprofile: OwnerProfile;
  theater: Theater;
  contactmessage: ContactMessage;
  video: Video;
}

export type CollectionName = keyof CollectionEntityMap;

export type EntityOf<K extends CollectionName> = CollectionEntityMap[K];

/**
 * A persisted record: the entity plus its id and timestamps
 */
export type StoredRecord<T> = T & {
  id: string;
  createdAt: Date;
  updatedAt: Date;
};

export type StoreFilter<T> = FilterQuery<T>;

export type StoreUpdate<T> = UpdateQuery<T>;

export type StoreSort<T> = { [P in keyof StoredRecord<T>]?: SortOrder };

/**
 * Document store contract
 *
 * Filters and updates use MongoDB query syntax (`_id`, `$gte`, `$inc`, `$set`).
 */
export interface DocumentStore {
  /**
   * Insert a record and return its generated id
   */
  create<K extends CollectionName>(
    collection: K,
    record: EntityOf<K>,
  ): Promise<string>;

  /**
   * Lazy sequence of matching records; each call runs a fresh query
   */
  find<K extends CollectionName>(
    collection: K,
    filter?: StoreFilter<EntityOf<K>>,
    sort?: StoreSort<EntityOf<K>>,
  ): AsyncIterable<StoredRecord<EntityOf<K>>>;

  findOne<K extends CollectionName>(
    collection: K,
    filter?: StoreFilter<EntityOf<K>>,
    sort?: StoreSort<EntityOf<K>>,
  ): Promise<StoredRecord<EntityOf<K>> | null>;

  /**
   * Apply `update` to the first document still matching `match`, as one
   * atomic storage operation.
   *
   * @returns the post-update record, or null if nothing matched
   */
  conditionalUpdate<K extends CollectionName>(
    collection: K,
    match: StoreFilter<EntityOf<K>>,
    update: StoreUpdate<EntityOf<K>>,
  ): Promise<StoredRecord<EntityOf<K>> | null>;

  count<K extends CollectionName>(
    collection: K,
    filter?: StoreFilter<EntityOf<K>>,
  ): Promise<number>;
}
