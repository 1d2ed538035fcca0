/**
 * Type exports.
 */

export type {
  Region,
  RegionPolicy,
  PinPolicy,
  PinOptions,
  JobStatus,
  SortDirection,
  PinPolicyInfo,
} from './common';
export { REGIONS, JOB_STATUSES } from './common';

export type {
  MetadataValue,
  MetadataKeyValues,
  MetadataUpdateValue,
  PinMetadata,
} from './metadata';
export { DELETE_KEY } from './metadata';

export type {
  PinByHash,
  PinByJson,
  PinByFile,
  PinExtras,
  HashPinPolicy,
  ChangePinMetadata,
  PinnedObject,
  PinByHashResult,
} from './pinning';
export { pinByHash, pinByJson, pinByFile } from './pinning';

export type { PinJobsFilter, PinJob, PinJobs } from './jobs';
export { PinJobsFilterBuilder } from './jobs';

export type {
  PinListStatus,
  KeyvalueOperator,
  KeyvalueQuery,
  PinListFilter,
  PinRegion,
  PinListItem,
  PinList,
  TotalPinnedData,
} from './data';
export { PinListFilterBuilder } from './data';
