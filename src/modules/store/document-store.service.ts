import {
  BadRequestException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Error as MongooseError, Model, SortOrder } from 'mongoose';

import { Event } from '../event/event.schema';
import { Reservation } from '../reservation/reservation.schema';
import { OwnerProfile } from '../owner/owner-profile.schema';
import { Theater } from '../theater/theater.schema';
import { ContactMessage } from '../contact/contact-message.schema';
import { Video } from '../video/video.schema';
import { STORE_CONNECTIVITY_ERRORS } from './store.constants';
import {
  CollectionName,
  DocumentStore,
  EntityOf,
  StoredRecord,
  StoreFilter,
  StoreSort,
  StoreUpdate,
} from './interfaces/document-store.interface';

type ModelMap = { [K in CollectionName]: Model<EntityOf<K>> };

/**
 * Check whether an error means MongoDB could not be reached
 */
export function isConnectivityError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    (STORE_CONNECTIVITY_ERRORS.has(error.name) ||
      /buffering timed out/.test(error.message))
  );
}

/**
 * DocumentStoreService - DocumentStore backed by mongoose models
 *
 * Each collection is served by the model registered for its entity schema,
 * so schema validation applies on insert.
 *
 * `conditionalUpdate` maps to a single `findOneAndUpdate`, which MongoDB
 * evaluates atomically per document: the filter and the mutation cannot be
 * interleaved with another writer.
 */
@Injectable()
export class DocumentStoreService implements DocumentStore {
  private readonly logger = new Logger(DocumentStoreService.name);
  private readonly models: ModelMap;

  constructor(
    @InjectModel(Event.name) eventModel: Model<Event>,
    @InjectModel(Reservation.name) reservationModel: Model<Reservation>,
    @InjectModel(OwnerProfile.name) ownerProfileModel: Model<OwnerProfile>,
    @InjectModel(Theater.name) theaterModel: Model<Theater>,
    @InjectModel(ContactMessage.name)
    contactMessageModel: Model<ContactMessage>,
    @InjectModel(Video.name) videoModel: Model<Video>,
  ) {
    this.models = {
      event: eventModel,
      reservation: reservationModel,
      ownerprofile: ownerProfileModel,
      theater: theaterModel,
      contactmessage: contactMessageModel,
      video: videoModel,
    };
  }

  async create<K extends CollectionName>(
    collection: K,
    record: EntityOf<K>,
  ): Promise<string> {
    try {
      const document = await this.models[collection].create(record);
      return String(document._id);
    } catch (error) {
      throw this.translateError(collection, 'create', error);
    }
  }

  async *find<K extends CollectionName>(
    collection: K,
    filter?: StoreFilter<EntityOf<K>>,
    sort?: StoreSort<EntityOf<K>>,
  ): AsyncGenerator<StoredRecord<EntityOf<K>>> {
    const model = this.models[collection];
    const query = filter ? model.find(filter) : model.find();

    try {
      for await (const document of query.sort(this.toSortOrder(sort)).cursor()) {
        yield document.toJSON<StoredRecord<EntityOf<K>>>();
      }
    } catch (error) {
      throw this.translateError(collection, 'find', error);
    }
  }

  async findOne<K extends CollectionName>(
    collection: K,
    filter?: StoreFilter<EntityOf<K>>,
    sort?: StoreSort<EntityOf<K>>,
  ): Promise<StoredRecord<EntityOf<K>> | null> {
    const model = this.models[collection];
    const query = filter ? model.findOne(filter) : model.findOne();

    try {
      const document = await query.sort(this.toSortOrder(sort)).exec();
      if (!document) {
        return null;
      }

      return document.toJSON<StoredRecord<EntityOf<K>>>();
    } catch (error) {
      throw this.translateError(collection, 'findOne', error);
    }
  }

  async conditionalUpdate<K extends CollectionName>(
    collection: K,
    match: StoreFilter<EntityOf<K>>,
    update: StoreUpdate<EntityOf<K>>,
  ): Promise<StoredRecord<EntityOf<K>> | null> {
    try {
      const document = await this.models[collection]
        .findOneAndUpdate(match, update, { new: true })
        .exec();
      if (!document) {
        return null;
      }

      return document.toJSON<StoredRecord<EntityOf<K>>>();
    } catch (error) {
      throw this.translateError(collection, 'conditionalUpdate', error);
    }
  }

  async count<K extends CollectionName>(
    collection: K,
    filter?: StoreFilter<EntityOf<K>>,
  ): Promise<number> {
    const model = this.models[collection];

    try {
      return filter
        ? await model.countDocuments(filter).exec()
        : await model.estimatedDocumentCount().exec();
    } catch (error) {
      throw this.translateError(collection, 'count', error);
    }
  }

  private toSortOrder<T>(sort?: StoreSort<T>): Record<string, SortOrder> {
    const order: Record<string, SortOrder> = {};
    if (!sort) {
      return order;
    }

    for (const [field, direction] of Object.entries(sort)) {
      if (direction !== undefined) {
        order[field] = direction;
      }
    }
    return order;
  }

  /**
   * Map driver and schema errors onto the HTTP error taxonomy
   */
  private translateError(
    collection: CollectionName,
    operation: string,
    error: unknown,
  ): unknown {
    if (error instanceof MongooseError.ValidationError) {
      const details: Record<string, string> = {};
      for (const [path, fieldError] of Object.entries(error.errors)) {
        details[path] = fieldError.message;
      }

      return new BadRequestException({
        statusCode: 400,
        errorCode: 'VALIDATION_ERROR',
        message: `Invalid ${collection} record`,
        details,
        timestamp: new Date().toISOString(),
      });
    }

    if (isConnectivityError(error)) {
      this.logger.error(
        `Document store unavailable during ${operation} on ${collection}: ${error.message}`,
      );

      return new ServiceUnavailableException({
        statusCode: 503,
        errorCode: 'STORE_UNAVAILABLE',
        message: 'The document store is currently unavailable',
        timestamp: new Date().toISOString(),
      });
    }

    return error;
  }
}
