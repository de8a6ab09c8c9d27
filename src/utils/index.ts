import { logger } from './logger';
import { display } from './cli/display';
import { spinner } from './spinner';
import { listenForInterrupt } from './interrupt';

export { logger, display, spinner, listenForInterrupt };
export type { InterruptGuard } from './interrupt';
