import { logger } from '../utils/logger';

logger.setSilent(true);
