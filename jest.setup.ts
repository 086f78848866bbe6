// Keep test output clean; individual tests raise the level when they inspect logs
process.env.SCALE_LOG_LEVEL = 'silent';
