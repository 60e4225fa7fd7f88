/**
 * Test utilities shared by the operator packages
 */

// Logger utilities
export {
  createSilentLogger,
  createMockLogger,
} from "./mock-logger";

// Content directory fixtures
export {
  createContentDirectory,
  shellScript,
  type ContentDirectoryFixture,
  type FixtureEntry,
} from "./content-directory";
