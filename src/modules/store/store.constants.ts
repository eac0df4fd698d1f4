/**
 * Injection token for the DocumentStore implementation
 */
export const DOCUMENT_STORE = Symbol('DOCUMENT_STORE');

/**
 * Error names raised by mongoose / the MongoDB driver when the server
 * cannot be reached
 */
export const STORE_CONNECTIVITY_ERRORS = new Set([
  'MongooseServerSelectionError',
  'MongoServerSelectionError',
  'MongoNetworkError',
  'MongoNetworkTimeoutError',
  'MongoNotConnectedError',
  'MongoTopologyClosedError',
]);
