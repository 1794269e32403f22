export { FirestoreStore } from './store';
export { FirestoreEventBus } from './events';
