/**
 * Vitest Global Setup
 *
 * Vitest has no `globalTeardown` option; it runs the `teardown` export of a
 * `globalSetup` module after all tests complete.
 *
 * @module tests/global-setup
 */

export { default as teardown } from './global-teardown.js';
