import { registerSweep } from './sweep/sweep';
import { configCommand } from './config/config';

export { registerSweep, configCommand };
