export { DisambiguationController } from './disambiguationController';
export { SessionLock } from './sessionLock';
export type {
  ClarificationOption,
  ClarificationRequest,
  DisambiguationOptions,
  DisambiguationStatus,
  PendingDisambiguation,
  Selection,
  TurnResult,
} from './types';
