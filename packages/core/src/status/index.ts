export {
  PARCEL_STATUSES,
  isParcelStatus,
  statusRank,
  nextStatus,
  isTerminalStatus,
  checkNewStatus,
  checkStatusTransition,
  checkRegistered,
} from './transitions.js';
export type { ParcelStatus, StatusTransition } from './transitions.js';
