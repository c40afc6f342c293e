export { SequelizeRunStore } from './SequelizeRunStore.js';
export type { SequelizeRunStoreOptions } from './SequelizeRunStore.js';
export { SequelizeProfileSink } from './SequelizeProfileSink.js';
export type { SequelizeProfileSinkOptions } from './SequelizeProfileSink.js';
export { SequelizeQualityCounterStore } from './SequelizeQualityCounterStore.js';
export type { SequelizeQualityCounterStoreOptions } from './SequelizeQualityCounterStore.js';
export { createSequelizeStoreFactory } from './createSequelizeStoreFactory.js';
