/**
 * Types for the account data endpoints: pin list and usage totals.
 */

import { z } from 'zod';
import { PinataError } from '../errors';
import { QueryParams, buildQuery } from '../transport';
import { toIsoDate } from './common';
import { checkPaging } from './jobs';
import { MetadataInfoSchema, PinMetadata } from './metadata';

/** Pin state filter of the pin list. */
export type PinListStatus = 'all' | 'pinned' | 'unpinned';

/** Comparison applied to a metadata key when filtering the pin list. */
export type KeyvalueOperator =
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'ne'
  | 'eq'
  | 'between'
  | 'notBetween'
  | 'like'
  | 'notLike'
  | 'iLike'
  | 'notILike'
  | 'regexp'
  | 'iRegexp';

const RANGE_OPERATORS: ReadonlySet<KeyvalueOperator> = new Set(['between', 'notBetween']);

/**
 * Condition on one metadata key. `secondValue` is the upper bound of the
 * range operators.
 */
export interface KeyvalueQuery {
  value: string | number;
  secondValue?: string | number;
  op: KeyvalueOperator;
}

/**
 * Filters for the pin list. Every field is optional.
 */
export interface PinListFilter {
  /** Substring of the content hash. */
  hashContains?: string;
  pinStart?: string | Date;
  pinEnd?: string | Date;
  unpinStart?: string | Date;
  unpinEnd?: string | Date;
  /** Minimum content size in bytes. */
  pinSizeMin?: number;
  /** Maximum content size in bytes. */
  pinSizeMax?: number;
  status?: PinListStatus;
  pageLimit?: number;
  pageOffset?: number;
  metadataName?: string;
  metadataKeyvalues?: Record<string, KeyvalueQuery>;
}

/**
 * Builder for PinListFilter.
 */
export class PinListFilterBuilder {
  private readonly filter: PinListFilter = {};

  static create(): PinListFilterBuilder {
    return new PinListFilterBuilder();
  }

  setHashContains(hash: string): this {
    this.filter.hashContains = hash;
    return this;
  }

  setPinStart(date: string | Date): this {
    this.filter.pinStart = date;
    return this;
  }

  setPinEnd(date: string | Date): this {
    this.filter.pinEnd = date;
    return this;
  }

  setUnpinStart(date: string | Date): this {
    this.filter.unpinStart = date;
    return this;
  }

  setUnpinEnd(date: string | Date): this {
    this.filter.unpinEnd = date;
    return this;
  }

  setPinSizeMin(bytes: number): this {
    this.filter.pinSizeMin = bytes;
    return this;
  }

  setPinSizeMax(bytes: number): this {
    this.filter.pinSizeMax = bytes;
    return this;
  }

  setStatus(status: PinListStatus): this {
    this.filter.status = status;
    return this;
  }

  setPageLimit(limit: number): this {
    this.filter.pageLimit = limit;
    return this;
  }

  setPageOffset(offset: number): this {
    this.filter.pageOffset = offset;
    return this;
  }

  setMetadataName(name: string): this {
    this.filter.metadataName = name;
    return this;
  }

  /**
   * Adds a condition on a metadata key; repeated calls accumulate.
   */
  addKeyvalue(key: string, query: KeyvalueQuery): this {
    this.filter.metadataKeyvalues = { ...this.filter.metadataKeyvalues, [key]: query };
    return this;
  }

  build(): PinListFilter {
    return { ...this.filter };
  }
}

function encodeKeyvalues(keyvalues: Record<string, KeyvalueQuery>): string | undefined {
  const entries = Object.entries(keyvalues);
  if (entries.length === 0) {
    return undefined;
  }
  for (const [key, query] of entries) {
    if (RANGE_OPERATORS.has(query.op) && query.secondValue === undefined) {
      throw PinataError.validation(
        `Operator "${query.op}" on "${key}" requires secondValue`,
        `metadataKeyvalues.${key}`
      );
    }
  }
  return JSON.stringify(keyvalues);
}

/**
 * Builds the query string of a pin list request, one parameter per set field.
 */
export function toPinListQuery(filter: PinListFilter = {}): QueryParams {
  checkPaging(filter.pageLimit, 'pageLimit');
  checkPaging(filter.pageOffset, 'pageOffset');
  checkPaging(filter.pinSizeMin, 'pinSizeMin');
  checkPaging(filter.pinSizeMax, 'pinSizeMax');

  return buildQuery({
    hashContains: filter.hashContains,
    pinStart: toIsoDate(filter.pinStart),
    pinEnd: toIsoDate(filter.pinEnd),
    unpinStart: toIsoDate(filter.unpinStart),
    unpinEnd: toIsoDate(filter.unpinEnd),
    pinSizeMin: filter.pinSizeMin,
    pinSizeMax: filter.pinSizeMax,
    status: filter.status,
    pageLimit: filter.pageLimit,
    pageOffset: filter.pageOffset,
    'metadata[name]': filter.metadataName,
    'metadata[keyvalues]': filter.metadataKeyvalues
      ? encodeKeyvalues(filter.metadataKeyvalues)
      : undefined,
  });
}

/**
 * Replication state of a pin in one region.
 */
export interface PinRegion {
  regionId: string;
  currentReplicationCount: number;
  desiredReplicationCount: number;
}

/**
 * One pinned (or formerly pinned) object.
 */
export interface PinListItem {
  id: string;
  ipfsPinHash: string;
  /** Size in bytes. */
  size: number;
  userId: string;
  datePinned: string;
  /** Set once the content has been unpinned. */
  dateUnpinned?: string;
  metadata: PinMetadata;
  regions: PinRegion[];
}

export const PinListItemSchema = z
  .object({
    id: z.string(),
    ipfs_pin_hash: z.string(),
    size: z.number(),
    user_id: z.string(),
    date_pinned: z.string(),
    date_unpinned: z.string().nullish(),
    metadata: MetadataInfoSchema.nullish(),
    regions: z
      .array(
        z.object({
          regionId: z.string(),
          currentReplicationCount: z.number(),
          desiredReplicationCount: z.number(),
        })
      )
      .nullish(),
  })
  .transform((wire): PinListItem => {
    const item: PinListItem = {
      id: wire.id,
      ipfsPinHash: wire.ipfs_pin_hash,
      size: wire.size,
      userId: wire.user_id,
      datePinned: wire.date_pinned,
      metadata: wire.metadata ?? {},
      regions: wire.regions ?? [],
    };
    if (wire.date_unpinned != null) {
      item.dateUnpinned = wire.date_unpinned;
    }
    return item;
  });

/**
 * One page of the pin list.
 */
export interface PinList {
  /** Total number of pins matching the filter. */
  count: number;
  rows: PinListItem[];
}

export const PinListSchema = z.object({
  count: z.number(),
  rows: z.array(PinListItemSchema),
});

/**
 * Aggregate usage of the account.
 */
export interface TotalPinnedData {
  /** Number of pins currently held. */
  pinCount: number;
  /** Total size in bytes of all unique pinned content. */
  pinSizeTotal: string;
  /** Total size in bytes counting every replica. */
  pinSizeWithReplicationsTotal: string;
}

const ByteCountSchema = z.union([z.string(), z.number()]).transform(String);

export const TotalPinnedDataSchema = z
  .object({
    pin_count: z.number(),
    pin_size_total: ByteCountSchema,
    pin_size_with_replications_total: ByteCountSchema,
  })
  .transform(
    (wire): TotalPinnedData => ({
      pinCount: wire.pin_count,
      pinSizeTotal: wire.pin_size_total,
      pinSizeWithReplicationsTotal: wire.pin_size_with_replications_total,
    })
  );
