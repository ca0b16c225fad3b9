import boxen from 'boxen';
import chalk from 'chalk';

type BoxenOptions = boxen.Options;

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
  ERROR: 'red',
} as const;

export type DisplayTheme = (typeof DisplayThemes)[keyof typeof DisplayThemes];

interface DisplayBoxOptions {
  title?: string;
  theme?: DisplayTheme;
}

const createDisplayBox = (content: string, options: DisplayBoxOptions = {}): string => {
  const { theme = DisplayThemes.INFO, title } = options;

  const boxOptions: BoxenOptions = {
    ...DEFAULT_BOX_OPTIONS,
    borderColor: theme,
    ...(title ? { title } : {}),
  };

  return boxen(content, boxOptions);
};

const displayBox = (content: string, options: DisplayBoxOptions = {}): void => {
  console.log(createDisplayBox(content, options));
};

/**
 * Creates formatted label-value pairs commonly used in command outputs
 */
export const formatLabelValue = (label: string, value: string): string => {
  return `${chalk.gray(`${label}:`)} ${value}`;
};

/**
 * Boxed summaries for command results and failures
 */
export const display = {
  success: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.SUCCESS, title }),

  error: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.ERROR, title }),
};
