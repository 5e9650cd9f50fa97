import { setSilent } from '../utils/logger.js';

setSilent(true);
