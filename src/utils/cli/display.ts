import boxen, { Options as BoxenOptions } from 'boxen';
import chalk from 'chalk';
import { logger } from '../logger';

/**
 * Standard boxen configuration used across all commands
 */
const DEFAULT_BOX_OPTIONS: BoxenOptions = {
  padding: 1,
  margin: { top: 1, bottom: 1, left: 1, right: 1 },
  borderStyle: 'round',
  titleAlignment: 'center',
};

/**
 * Color themes for different types of displays
 */
export const DisplayThemes = {
  INFO: 'blue',
  SUCCESS: 'green',
  WARNING: 'yellow',
  ERROR: 'red',
  HIGHLIGHT: 'magenta',
} as const;

export type DisplayTheme = (typeof DisplayThemes)[keyof typeof DisplayThemes];

interface DisplayBoxOptions {
  title?: string;
  theme?: DisplayTheme;
}

/**
 * Creates a standardized boxen display with consistent styling
 */
export const createDisplayBox = (content: string, options: DisplayBoxOptions = {}): string => {
  const { theme = DisplayThemes.INFO, title } = options;

  const boxOptions: BoxenOptions = {
    ...DEFAULT_BOX_OPTIONS,
    borderColor: theme,
    ...(title ? { title } : {}),
  };

  return boxen(content, boxOptions);
};

/**
 * Displays a boxen to console with standard formatting.
 * Error boxes go to stderr and ignore the quiet flag.
 */
export const displayBox = (content: string, options: DisplayBoxOptions = {}): void => {
  if (options.theme === DisplayThemes.ERROR) {
    console.error(createDisplayBox(content, options));
    return;
  }
  if (logger.level === 'silent') return;
  console.log(createDisplayBox(content, options));
};

/**
 * Creates formatted label-value pairs commonly used in command outputs
 */
export const formatLabelValue = (label: string, value: string): string => {
  return `${chalk.gray(`${label}:`)} ${value}`;
};

export const display = {
  success: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.SUCCESS, title }),

  error: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.ERROR, title }),

  warning: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.WARNING, title }),

  info: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.INFO, title }),

  highlight: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.HIGHLIGHT, title }),
};
