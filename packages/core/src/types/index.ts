export type { Parcel, NewParcel } from './parcel.js';
