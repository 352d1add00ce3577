// Keep test output readable; flows log at info level.
process.env.LOG_LEVEL ??= 'error';
process.env.NODE_ENV ??= 'test';
