/**
 * Common types shared across the Pinata client.
 */

import { z } from 'zod';

/** Regions a pin policy can target. */
export const REGIONS = ['FRA1', 'NYC1'] as const;

/**
 * Pinata region identifier.
 *
 * - `FRA1`: Frankfurt, Germany
 * - `NYC1`: New York City, USA
 */
export type Region = (typeof REGIONS)[number];

/**
 * Region and desired replication for that region.
 */
export interface RegionPolicy {
  id: Region;
  /** Replica count for the region; most regions allow at most 2. */
  desiredReplicationCount: number;
}

/**
 * Per-region replication policy.
 */
export interface PinPolicy {
  regions: RegionPolicy[];
}

/**
 * Additional options accepted by the pinning endpoints.
 */
export interface PinOptions {
  /** Multiaddresses of nodes the content is already stored on (pin by hash only). */
  hostNodes?: string[];
  /** Pin policy for this piece of content instead of the account default. */
  customPinPolicy?: PinPolicy;
  /** CID version IPFS uses when creating a hash for the content. */
  cidVersion?: 0 | 1;
  /** Wrap uploaded content in a directory (file and JSON pins). */
  wrapWithDirectory?: boolean;
}

/**
 * Status of a pin job.
 *
 * - `prechecking`: preliminary validations on the pin request are running
 * - `searching`: the content is being looked for on the IPFS network
 * - `retrieving`: the content was located and is being retrieved
 * - `expired`: the content was not found after a day of searching
 * - `over_free_limit`: pinning would exceed the free tier
 * - `over_max_size`: the object is too large to pin
 * - `invalid_object`: the object is not readable by IPFS nodes
 * - `bad_host_node`: a host node given in the request was invalid or unreachable
 */
export const JOB_STATUSES = [
  'prechecking',
  'searching',
  'retrieving',
  'expired',
  'over_free_limit',
  'over_max_size',
  'invalid_object',
  'bad_host_node',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const JobStatusSchema = z.enum(JOB_STATUSES);

/** Sort direction by date. */
export type SortDirection = 'ASC' | 'DESC';

/**
 * Pin policy as reported back by the service.
 */
export const PinPolicyInfoSchema = z.object({
  regions: z.array(
    z.object({
      id: z.string(),
      desiredReplicationCount: z.number(),
    })
  ),
});

export type PinPolicyInfo = z.infer<typeof PinPolicyInfoSchema>;

/**
 * Converts a date filter to the ISO 8601 form the service expects.
 */
export function toIsoDate(value: string | Date | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'string' ? value : value.toISOString();
}
