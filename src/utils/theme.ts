/**
 * Console color theme for the CLI
 * Optimized for visibility on dark terminal backgrounds
 */

import chalk from "chalk";

export const theme = {
  primary: chalk.cyan,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,

  heading: chalk.bold.cyan,
  label: chalk.white,
  value: chalk.green,

  info: chalk.cyan,
  muted: chalk.gray, // gray instead of dim for less important text
  command: chalk.bold.yellow,

  errorText: chalk.bold.red,
  successText: chalk.bold.green,
};

/**
 * Semantic theme mappings for consistent usage
 */
export const semantic = {
  statusOk: theme.success,
  statusError: theme.error,

  title: theme.heading,
  description: theme.muted,

  fieldName: theme.label,
  fieldValue: theme.value,

  messageError: theme.errorText,
  messageSuccess: theme.successText,
};
