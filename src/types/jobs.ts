/**
 * Pin job listing: filters, builder and response shapes.
 */

import { z } from 'zod';
import { PinataError } from '../errors';
import { QueryParams, buildQuery } from '../transport';
import {
  JobStatus,
  JobStatusSchema,
  PinPolicyInfo,
  PinPolicyInfoSchema,
  SortDirection,
} from './common';
import { KeyValuesSchema, MetadataKeyValues } from './metadata';

/**
 * Filters for listing pin jobs. Every field is optional.
 */
export interface PinJobsFilter {
  /** Sort by date queued. */
  sort?: SortDirection;
  status?: JobStatus;
  ipfsPinHash?: string;
  /** Records per page. */
  limit?: number;
  /** Records to skip; used to fetch further pages. */
  offset?: number;
}

/**
 * Builder for PinJobsFilter.
 *
 * @example
 * ```typescript
 * const filter = PinJobsFilterBuilder.create()
 *   .setSort('ASC')
 *   .setStatus('prechecking')
 *   .build();
 * ```
 */
export class PinJobsFilterBuilder {
  private readonly filter: PinJobsFilter = {};

  static create(): PinJobsFilterBuilder {
    return new PinJobsFilterBuilder();
  }

  setSort(direction: SortDirection): this {
    this.filter.sort = direction;
    return this;
  }

  setStatus(status: JobStatus): this {
    this.filter.status = status;
    return this;
  }

  setIpfsPinHash(hash: string): this {
    this.filter.ipfsPinHash = hash;
    return this;
  }

  setLimit(limit: number): this {
    this.filter.limit = limit;
    return this;
  }

  setOffset(offset: number): this {
    this.filter.offset = offset;
    return this;
  }

  build(): PinJobsFilter {
    return { ...this.filter };
  }
}

/**
 * Ensures a paging value is a non-negative integer.
 */
export function checkPaging(value: number | undefined, param: string): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw PinataError.validation(`${param} must be a non-negative integer, got ${value}`, param);
  }
}

/**
 * Builds the query string of a pin jobs request, one parameter per set field.
 */
export function toPinJobsQuery(filter: PinJobsFilter = {}): QueryParams {
  checkPaging(filter.limit, 'limit');
  checkPaging(filter.offset, 'offset');

  return buildQuery({
    sort: filter.sort,
    status: filter.status,
    ipfs_pin_hash: filter.ipfsPinHash,
    limit: filter.limit,
    offset: filter.offset,
  });
}

/**
 * Pin job record.
 */
export interface PinJob {
  id: string;
  ipfsPinHash: string;
  /** Date the hash was queued, ISO 8601. */
  dateQueued: string;
  status: JobStatus;
  name?: string;
  keyvalues?: MetadataKeyValues;
  hostNodes?: string[];
  /** Policy applied to the content once it is found. */
  pinPolicy?: PinPolicyInfo;
}

export const PinJobSchema = z
  .object({
    id: z.string(),
    ipfs_pin_hash: z.string(),
    date_queued: z.string(),
    status: JobStatusSchema,
    name: z.string().nullish(),
    keyvalues: KeyValuesSchema.nullish(),
    host_nodes: z.array(z.string()).nullish(),
    pin_policy: PinPolicyInfoSchema.nullish(),
  })
  .transform((wire): PinJob => {
    const job: PinJob = {
      id: wire.id,
      ipfsPinHash: wire.ipfs_pin_hash,
      dateQueued: wire.date_queued,
      status: wire.status,
    };
    if (wire.name != null) job.name = wire.name;
    if (wire.keyvalues != null) job.keyvalues = wire.keyvalues;
    if (wire.host_nodes != null) job.hostNodes = wire.host_nodes;
    if (wire.pin_policy != null) job.pinPolicy = wire.pin_policy;
    return job;
  });

/**
 * One page of pin jobs.
 */
export interface PinJobs {
  /** Total number of jobs matching the filter. */
  count: number;
  rows: PinJob[];
}

export const PinJobsSchema = z.object({
  count: z.number(),
  rows: z.array(PinJobSchema),
});
