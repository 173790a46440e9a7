import { LogLevel, logger } from './utils/logger.js';

logger.setLevel(LogLevel.SILENT);
