// Keep test output readable; individual tests can still raise the level.
process.env.LOG_LEVEL ??= 'silent';
