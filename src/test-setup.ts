import { createLogger } from './utils/logger.js';

createLogger('silent', { pretty: false });
