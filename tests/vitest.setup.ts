
// Test-only environment defaults: keep JSON log lines out of test output
// unless a test opts in.

process.env.LOG_LEVEL ||= 'error';
