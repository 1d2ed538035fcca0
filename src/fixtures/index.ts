/**
 * Wire-shaped response bodies, as the service sends them.
 */

/** A CIDv0 hash used across fixtures. */
export const FIXTURE_HASH = 'QmTestHash0000000000000000000000000000000000000';

export const pinnedObjectFixture = (overrides: Record<string, unknown> = {}) => ({
  IpfsHash: FIXTURE_HASH,
  PinSize: 57,
  Timestamp: '2024-05-01T10:00:00.000Z',
  ...overrides,
});

export const pinByHashResultFixture = (overrides: Record<string, unknown> = {}) => ({
  id: 'job-1',
  ipfsHash: FIXTURE_HASH,
  status: 'prechecking',
  name: null,
  ...overrides,
});

export const pinJobFixture = (overrides: Record<string, unknown> = {}) => ({
  id: 'job-1',
  ipfs_pin_hash: FIXTURE_HASH,
  date_queued: '2024-05-01T10:00:00.000Z',
  status: 'searching',
  name: 'queued-item',
  keyvalues: null,
  host_nodes: null,
  pin_policy: { regions: [{ id: 'FRA1', desiredReplicationCount: 1 }] },
  ...overrides,
});

export const pinListItemFixture = (overrides: Record<string, unknown> = {}) => ({
  id: 'pin-1',
  ipfs_pin_hash: FIXTURE_HASH,
  size: 57,
  user_id: 'user-1',
  date_pinned: '2024-05-01T10:00:00.000Z',
  date_unpinned: null,
  metadata: { name: 'N', keyvalues: { project: 'demo' } },
  regions: [{ regionId: 'NYC1', currentReplicationCount: 1, desiredReplicationCount: 1 }],
  ...overrides,
});

export const totalPinnedDataFixture = (overrides: Record<string, unknown> = {}) => ({
  pin_count: 3,
  pin_size_total: '1024',
  pin_size_with_replications_total: '2048',
  ...overrides,
});
