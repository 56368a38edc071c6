/**
 * Test setup file
 * Loaded by Vitest before test modules, so env vars are set at import time.
 */

process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "error";
process.env.SSE_REQUIRE_AUTH = "false";
process.env.JWT_SECRET = "test-secret";
process.env.PUBLISH_TOKEN = "test-publish-token";
