/**
 * Request and response types for the pinning endpoints.
 */

import { z } from 'zod';
import { JobStatus, JobStatusSchema, PinOptions, RegionPolicy } from './common';
import {
  MetadataUpdateValue,
  PinMetadata,
  WireMetadata,
  serializeMetadata,
  serializeMetadataUpdate,
} from './metadata';

/**
 * Pins content already available on the IPFS network by its hash.
 *
 * @example
 * ```typescript
 * const job = await client.pinning.pinByHash({
 *   hashToPin: 'QmExampleHash',
 *   metadata: { name: 'backup', keyvalues: { env: 'prod' } },
 * });
 * ```
 */
export interface PinByHash {
  hashToPin: string;
  metadata?: PinMetadata;
  options?: PinOptions;
}

/**
 * Pins a JSON-serializable value.
 */
export interface PinByJson<T = unknown> {
  content: T;
  metadata?: PinMetadata;
  options?: PinOptions;
}

/**
 * Pins local files or directories.
 *
 * Each path may name a file or a directory; directories are uploaded with
 * their whole tree.
 */
export interface PinByFile {
  paths: string[];
  metadata?: PinMetadata;
  options?: PinOptions;
}

/**
 * Pin policy change for one pinned hash. Does not affect the account-level
 * policy.
 */
export interface HashPinPolicy {
  ipfsPinHash: string;
  regions: RegionPolicy[];
}

/**
 * Metadata change for one pinned hash.
 *
 * Leaving `name` unset keeps the current name. Keys not listed keep their
 * current value; a `null` value removes the key.
 */
export interface ChangePinMetadata {
  ipfsPinHash: string;
  name?: string;
  keyvalues?: Record<string, MetadataUpdateValue>;
}

/**
 * Extra fields shared by the request helpers.
 */
export interface PinExtras {
  metadata?: PinMetadata;
  options?: PinOptions;
}

export function pinByHash(hashToPin: string, extras: PinExtras = {}): PinByHash {
  return { hashToPin, ...extras };
}

export function pinByJson<T>(content: T, extras: PinExtras = {}): PinByJson<T> {
  return { content, ...extras };
}

export function pinByFile(paths: string | string[], extras: PinExtras = {}): PinByFile {
  return { paths: Array.isArray(paths) ? [...paths] : [paths], ...extras };
}

// ============================================================================
// Wire serialization
// ============================================================================

export interface PinByHashBody {
  hashToPin: string;
  pinataMetadata?: WireMetadata;
  pinataOptions?: PinOptions;
}

export interface PinByJsonBody<T> {
  pinataContent: T;
  pinataMetadata?: WireMetadata;
  pinataOptions?: PinOptions;
}

export interface HashPinPolicyBody {
  ipfsPinHash: string;
  newPinPolicy: { regions: RegionPolicy[] };
}

export interface ChangePinMetadataBody {
  ipfsPinHash: string;
  name?: string;
  keyvalues?: Record<string, MetadataUpdateValue>;
}

export function serializePinByHash(request: PinByHash): PinByHashBody {
  const body: PinByHashBody = { hashToPin: request.hashToPin };
  if (request.metadata) {
    body.pinataMetadata = serializeMetadata(request.metadata);
  }
  if (request.options) {
    body.pinataOptions = { ...request.options };
  }
  return body;
}

export function serializePinByJson<T>(request: PinByJson<T>): PinByJsonBody<T> {
  const body: PinByJsonBody<T> = { pinataContent: request.content };
  if (request.metadata) {
    body.pinataMetadata = serializeMetadata(request.metadata);
  }
  if (request.options) {
    body.pinataOptions = { ...request.options };
  }
  return body;
}

export function serializeHashPinPolicy(policy: HashPinPolicy): HashPinPolicyBody {
  return {
    ipfsPinHash: policy.ipfsPinHash,
    newPinPolicy: { regions: policy.regions.map((region) => ({ ...region })) },
  };
}

export function serializeChangePinMetadata(change: ChangePinMetadata): ChangePinMetadataBody {
  const body: ChangePinMetadataBody = { ipfsPinHash: change.ipfsPinHash };
  if (change.name !== undefined) {
    body.name = change.name;
  }
  if (change.keyvalues !== undefined) {
    body.keyvalues = serializeMetadataUpdate(change.keyvalues);
  }
  return body;
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Confirmation for content pinned by upload.
 */
export interface PinnedObject {
  /** IPFS multi-hash of the content. */
  ipfsHash: string;
  /** Size of the content in bytes. */
  pinSize: number;
  /** Pin timestamp in ISO 8601 format. */
  timestamp: string;
  /** Set when the same content was already pinned by the account. */
  isDuplicate?: boolean;
}

export const PinnedObjectSchema = z
  .object({
    IpfsHash: z.string(),
    PinSize: z.number(),
    Timestamp: z.string(),
    isDuplicate: z.boolean().optional(),
  })
  .transform((wire): PinnedObject => {
    const pinned: PinnedObject = {
      ipfsHash: wire.IpfsHash,
      pinSize: wire.PinSize,
      timestamp: wire.Timestamp,
    };
    if (wire.isDuplicate !== undefined) {
      pinned.isDuplicate = wire.isDuplicate;
    }
    return pinned;
  });

/**
 * Pin job created by a pin-by-hash request.
 */
export interface PinByHashResult {
  /** Pinata's ID for the pin job. */
  id: string;
  ipfsHash: string;
  status: JobStatus;
  name?: string;
}

export const PinByHashResultSchema = z
  .object({
    id: z.string(),
    ipfsHash: z.string(),
    status: JobStatusSchema,
    name: z.string().nullish(),
  })
  .transform((wire): PinByHashResult => {
    const result: PinByHashResult = {
      id: wire.id,
      ipfsHash: wire.ipfsHash,
      status: wire.status,
    };
    if (wire.name != null) {
      result.name = wire.name;
    }
    return result;
  });
