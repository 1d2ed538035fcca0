/**
 * Pin metadata: an optional display name plus custom key/value tags.
 */

import { z } from 'zod';
import { PinataError } from '../errors';

/** Value of a metadata tag. */
export type MetadataValue = string | number;

export type MetadataKeyValues = Record<string, MetadataValue>;

/**
 * Value accepted when changing existing metadata; `null` deletes the key.
 */
export type MetadataUpdateValue = MetadataValue | null;

/** Marker that removes a key when passed to `changeHashMetadata`. */
export const DELETE_KEY = null;

/**
 * Metadata attached when content is first pinned.
 */
export interface PinMetadata {
  name?: string;
  keyvalues?: MetadataKeyValues;
}

/**
 * Wire form of `pinataMetadata`.
 */
export interface WireMetadata {
  name?: string;
  keyvalues?: MetadataKeyValues;
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Serializes creation metadata. Deletion markers are rejected here since they
 * only mean something when updating existing metadata.
 */
export function serializeMetadata(metadata: PinMetadata): WireMetadata {
  const wire: WireMetadata = {};
  if (metadata.name !== undefined) {
    wire.name = metadata.name;
  }
  if (metadata.keyvalues !== undefined) {
    for (const [key, value] of Object.entries(metadata.keyvalues)) {
      if (!isMetadataValue(value)) {
        throw PinataError.validation(
          `Metadata value for "${key}" must be a string or a finite number`,
          `keyvalues.${key}`
        );
      }
    }
    wire.keyvalues = { ...metadata.keyvalues };
  }
  return wire;
}

/**
 * Serializes update key/values, keeping `null` deletion markers.
 */
export function serializeMetadataUpdate(
  keyvalues: Record<string, MetadataUpdateValue>
): Record<string, MetadataUpdateValue> {
  for (const [key, value] of Object.entries(keyvalues)) {
    if (value !== null && !isMetadataValue(value)) {
      throw PinataError.validation(
        `Metadata value for "${key}" must be a string, a finite number or null`,
        `keyvalues.${key}`
      );
    }
  }
  return { ...keyvalues };
}

const MetadataValueSchema = z.union([z.string(), z.number()]);

/**
 * Metadata as returned in list responses.
 */
export const MetadataInfoSchema = z
  .object({
    name: z.string().nullish(),
    keyvalues: z.record(MetadataValueSchema).nullish(),
  })
  .transform((wire): PinMetadata => {
    const metadata: PinMetadata = {};
    if (wire.name != null) {
      metadata.name = wire.name;
    }
    if (wire.keyvalues != null) {
      metadata.keyvalues = wire.keyvalues;
    }
    return metadata;
  });

export const KeyValuesSchema = z.record(MetadataValueSchema);
