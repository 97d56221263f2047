/**
 * Test setup: keep pipeline logging out of the test output
 */
process.env['LOG_LEVEL'] ??= 'error';
