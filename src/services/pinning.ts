/**
 * Pinning service: adding, removing and reconfiguring pinned content.
 */

import { PinataError } from '../errors';
import { Logger, NoopLogger } from '../observability/logging';
import { HttpTransport, parseOkResult, parseResult } from '../transport';
import { buildPinFileForm, collectAllParts } from '../upload';
import { PinJobs, PinJobsFilter, PinJobsSchema, toPinJobsQuery } from '../types/jobs';
import {
  ChangePinMetadata,
  HashPinPolicy,
  PinByFile,
  PinByHash,
  PinByHashResult,
  PinByHashResultSchema,
  PinByJson,
  PinnedObject,
  PinnedObjectSchema,
  serializeChangePinMetadata,
  serializeHashPinPolicy,
  serializePinByHash,
  serializePinByJson,
} from '../types/pinning';

/**
 * Pinning service interface.
 */
export interface PinningService {
  /**
   * Changes the pin policy of one pinned hash. The account-level policy is
   * left untouched.
   */
  setHashPinPolicy(policy: HashPinPolicy): Promise<void>;

  /**
   * Queues a hash for asynchronous pinning. The content must already be
   * available from another node of the IPFS network.
   */
  pinByHash(request: PinByHash): Promise<PinByHashResult>;

  /**
   * Lists the jobs currently in the pin queue.
   */
  getPinJobs(filter?: PinJobsFilter): Promise<PinJobs>;

  /**
   * Pins a JSON-serializable value.
   */
  pinJson<T>(request: PinByJson<T>): Promise<PinnedObject>;

  /**
   * Uploads and pins files or whole directories.
   */
  pinFile(request: PinByFile): Promise<PinnedObject>;

  /**
   * Unpins previously pinned content.
   */
  unpin(hash: string): Promise<void>;

  /**
   * Changes the name and key/values of pinned content.
   */
  changeHashMetadata(change: ChangePinMetadata): Promise<void>;
}

function requireHash(hash: string, param: string): void {
  if (hash.trim().length === 0) {
    throw PinataError.validation(`${param} is required`, param);
  }
}

/**
 * Default pinning service implementation.
 */
export class DefaultPinningService implements PinningService {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(transport: HttpTransport, logger: Logger = new NoopLogger()) {
    this.transport = transport;
    this.logger = logger;
  }

  async setHashPinPolicy(policy: HashPinPolicy): Promise<void> {
    requireHash(policy.ipfsPinHash, 'ipfsPinHash');

    const response = await this.transport.request({
      method: 'PUT',
      path: '/pinning/hashPinPolicy',
      body: serializeHashPinPolicy(policy),
    });

    parseOkResult(response);
  }

  async pinByHash(request: PinByHash): Promise<PinByHashResult> {
    requireHash(request.hashToPin, 'hashToPin');

    const response = await this.transport.request({
      method: 'POST',
      path: '/pinning/pinByHash',
      body: serializePinByHash(request),
    });

    return parseResult(response, PinByHashResultSchema);
  }

  async getPinJobs(filter: PinJobsFilter = {}): Promise<PinJobs> {
    const response = await this.transport.request({
      method: 'GET',
      path: '/pinning/pinJobs',
      query: toPinJobsQuery(filter),
    });

    return parseResult(response, PinJobsSchema);
  }

  async pinJson<T>(request: PinByJson<T>): Promise<PinnedObject> {
    const response = await this.transport.request({
      method: 'POST',
      path: '/pinning/pinJSONToIPFS',
      body: serializePinByJson(request),
    });

    return parseResult(response, PinnedObjectSchema);
  }

  async pinFile(request: PinByFile): Promise<PinnedObject> {
    if (request.paths.length === 0) {
      throw PinataError.validation('At least one file or directory path is required', 'paths');
    }

    const parts = await collectAllParts(request.paths);
    this.logger.debug('Assembled upload', {
      paths: request.paths,
      parts: parts.length,
      bytes: parts.reduce((total, part) => total + part.content.length, 0),
    });

    const response = await this.transport.request({
      method: 'POST',
      path: '/pinning/pinFileToIPFS',
      body: buildPinFileForm(parts, request.metadata, request.options),
    });

    return parseResult(response, PinnedObjectSchema);
  }

  async unpin(hash: string): Promise<void> {
    requireHash(hash, 'hash');

    const response = await this.transport.request({
      method: 'DELETE',
      path: `/pinning/unpin/${encodeURIComponent(hash)}`,
    });

    parseOkResult(response);
  }

  async changeHashMetadata(change: ChangePinMetadata): Promise<void> {
    requireHash(change.ipfsPinHash, 'ipfsPinHash');

    const response = await this.transport.request({
      method: 'PUT',
      path: '/pinning/hashMetadata',
      body: serializeChangePinMetadata(change),
    });

    parseOkResult(response);
  }
}

export function createPinningService(transport: HttpTransport, logger?: Logger): PinningService {
  return new DefaultPinningService(transport, logger);
}
