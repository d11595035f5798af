/**
 * Schedule System
 *
 * CSV schedule stored as a single versioned blob behind a contents API.
 */

// Types
export { WEEKDAYS, CANONICAL_COLUMNS } from './types.js'
export type {
  Weekday,
  CanonicalColumn,
  EventRecord,
  StoredEvent,
  ScheduleTable,
  RawTable,
  RecurrenceMode,
  VersionToken,
  StoreConfig,
  FetchResult,
  LoadedSchedule,
  WriteResult,
  FetchLike,
  ScheduleStore,
  ManualEventInput,
  SyncAction,
  SyncFailure,
  SyncOutcome,
} from './types.js'

// Errors
export {
  ScheduleError,
  TransportError,
  DecodeError,
  ParseError,
  ConfigError,
  MissingCredentialError,
  ConflictError,
  describeError,
} from './errors.js'
export type { ScheduleErrorKind } from './errors.js'

// Implementation
export {
  normalize,
  normalizeRecords,
  assignIds,
  parseCalendarDate,
  weekdayOf,
  rowLabel,
  emptyTable,
} from './record.js'
export { parseCsv, serializeCsv } from './csv.js'
export {
  RemoteScheduleStore,
  createRemoteScheduleStore,
  decodeContent,
  encodeContent,
} from './store-client.js'
export type { RemoteScheduleStoreOptions } from './store-client.js'
export { MockContentsApi, gitBlobSha } from './mock-contents-api.js'
export type { MockContentsApiOptions, RecordedRequest, RecordedPut } from './mock-contents-api.js'
export { parseEvent, chronoDateResolver, PARSE_HINT } from './parser.js'
export type { DateResolver, ParseEventOptions } from './parser.js'
export { expandRecurrence, RECURRENCE_MODES } from './recurrence.js'
export type { RecurrenceInput } from './recurrence.js'
export {
  WEEKDAY_ORDER,
  filterByWeekday,
  sortForDisplay,
  pivotWeekdayTime,
  labelOptions,
} from './view.js'
export type { WeekdayFilter, WeekdayTimeGrid, LabelOption } from './view.js'
export { ScheduleSync, COMMIT_MESSAGES } from './sync.js'
export type { ScheduleSyncOptions } from './sync.js'
export { UnavailableSpeechToText } from './speech.js'
export type { SpeechToText } from './speech.js'
export {
  findConfigDir,
  loadSchedulerConfig,
  loadStoreCredential,
  buildStoreConfig,
} from './config.js'
export type { SchedulerConfig, StoreMode, LoadOptions } from './config.js'
