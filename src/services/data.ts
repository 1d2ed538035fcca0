/**
 * Data service: credentials check, pin list and account usage.
 */

import { HttpTransport, parseOkResult, parseResult } from '../transport';
import {
  PinList,
  PinListFilter,
  PinListSchema,
  TotalPinnedData,
  TotalPinnedDataSchema,
  toPinListQuery,
} from '../types/data';

/**
 * Data service interface.
 */
export interface DataService {
  /**
   * Resolves when the credentials are accepted, rejects otherwise.
   */
  testAuthentication(): Promise<void>;

  /**
   * Returns the combined size of all content pinned by the account.
   */
  getTotalUserPinnedData(): Promise<TotalPinnedData>;

  /**
   * Lists pinned content and how long it has been pinned.
   */
  getPinList(filter?: PinListFilter): Promise<PinList>;
}

/**
 * Default data service implementation.
 */
export class DefaultDataService implements DataService {
  private readonly transport: HttpTransport;

  constructor(transport: HttpTransport) {
    this.transport = transport;
  }

  async testAuthentication(): Promise<void> {
    const response = await this.transport.request({
      method: 'GET',
      path: '/data/testAuthentication',
    });

    parseOkResult(response);
  }

  async getTotalUserPinnedData(): Promise<TotalPinnedData> {
    const response = await this.transport.request({
      method: 'GET',
      path: '/data/userPinnedDataTotal',
    });

    return parseResult(response, TotalPinnedDataSchema);
  }

  async getPinList(filter: PinListFilter = {}): Promise<PinList> {
    const response = await this.transport.request({
      method: 'GET',
      path: '/data/pinList',
      query: toPinListQuery(filter),
    });

    return parseResult(response, PinListSchema);
  }
}

export function createDataService(transport: HttpTransport): DataService {
  return new DefaultDataService(transport);
}
