export * from './adapters/store';
export * from './adapters/events';
export { InMemoryDocumentStore, InMemoryEventBus } from './adapters/memory';
