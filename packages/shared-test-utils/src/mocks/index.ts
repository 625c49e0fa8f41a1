/**
 * Mock implementations for testing
 */

export { createMockFetch, type MockRoute } from './fetch-mock.js';
