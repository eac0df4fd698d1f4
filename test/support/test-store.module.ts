import { DynamicModule, Module } from '@nestjs/common';

import { DOCUMENT_STORE } from '../../src/modules/store/store.constants';
import { DocumentStore } from '../../src/modules/store/interfaces/document-store.interface';

/**
 * Global module that binds DOCUMENT_STORE to a given instance,
 * standing in for StoreModule (and its MongoDB connection) in tests.
 */
@Module({})
export class TestStoreModule {
  static register(store: DocumentStore): DynamicModule {
    return {
      module: TestStoreModule,
      global: true,
      providers: [{ provide: DOCUMENT_STORE, useValue: store }],
      exports: [DOCUMENT_STORE],
    };
  }
}
