import { formatHelp, displayVersion, displayError } from './cli-display';
import { display } from './display';

export { formatHelp, displayVersion, displayError, display };
export type { PackageInfo } from './cli-display';
