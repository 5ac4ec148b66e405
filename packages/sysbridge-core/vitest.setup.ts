import { Logger, LogLevel } from './src/utils/logger.js';

// Quiet info and warn output during tests.
Logger.setLevel(LogLevel.ERROR);
