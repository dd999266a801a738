import chalk from 'chalk';

export const icons = {
  success: chalk.green('\u2714'),
  error: chalk.red('\u2716'),
  warning: chalk.yellow('\u26A0'),
  info: chalk.blue('\u2139'),
};

export function header(text: string): string {
  return chalk.bold.underline(text);
}

export function label(text: string): string {
  return chalk.dim(text);
}
