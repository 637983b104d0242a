/**
 * In-memory fakes for the ports, shared across tests.
 */

export { InMemoryFileSystem } from './file-system.fake.js';
export { FakeTimeClock } from './time-clock.fake.js';
export { FakeThreadIdentity } from './thread-identity.fake.js';
