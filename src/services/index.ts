/**
 * Service exports.
 */

export type { PinningService } from './pinning';
export { DefaultPinningService, createPinningService } from './pinning';

export type { DataService } from './data';
export { DefaultDataService, createDataService } from './data';
