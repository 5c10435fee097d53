/**
 * Jest Test Setup
 *
 * Keeps service logging out of test output. Tests that assert on a log line
 * spy on console themselves.
 */

jest.spyOn(console, "log").mockImplementation(() => undefined)
jest.spyOn(console, "warn").mockImplementation(() => undefined)
jest.spyOn(console, "error").mockImplementation(() => undefined)
