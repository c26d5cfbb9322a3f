/**
 * Simulation support for testing without a cluster
 * @module aistore-client/simulation
 */

export { MockTransport, collectBody } from './mock-transport.js';
export {
  InMemoryCluster,
  createInMemoryCluster,
  computeChecksum,
} from './memory-cluster.js';
export type {
  RecordedRequest,
  MockResponse,
  MockHandler,
  MockTransportOptions,
  StoredObject,
} from './types.js';
