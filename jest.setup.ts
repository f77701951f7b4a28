/**
 * Jest setup file.
 * Console output is asserted as plain text.
 */
import chalk from 'chalk';

chalk.level = 0;
