export { createMockLogger } from '../logger/test-utils.js';
