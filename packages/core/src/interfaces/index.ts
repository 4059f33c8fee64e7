export type { Logger } from './logger.js';
export type { OperationContext } from './operation-context.js';
export type { ParcelStore, ParcelStoreOptions } from './parcel-store.js';
export type { ParcelTable, ParcelRow } from './parcel-table.js';
