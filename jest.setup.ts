// Keep test output readable; individual tests raise the level when they assert on logs.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'ERROR';
