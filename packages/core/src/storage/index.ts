export {
  MemoryDocumentStore,
  FileDocumentStore,
  assertStoreKey,
  type DocumentStore,
} from './document-store.js';
