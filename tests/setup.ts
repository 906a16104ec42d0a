/**
 * Jest Test Setup
 * Pins the environment before any application module reads its configuration.
 */

// Set NODE_ENV before any imports
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.HOST_URL = 'http://localhost:8000';
process.env.APP_TIMEZONE = 'Asia/Kolkata';

export const TEST_JWT_SECRET = 'test-secret';

// Acting user recorded as `created_by` / `performed_by` in tests
export const TEST_USER_ID = '123e4567-e89b-12d3-a456-426614174000';

// Keep start-up and progress lines out of the test output
beforeAll(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterAll(() => {
  jest.restoreAllMocks();
});
