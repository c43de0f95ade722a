import type { Command } from 'commander';
import { registerCheckCommand } from './check.js';
import { registerLogsCommand } from './logs.js';
import { registerPrintersCommand } from './printers.js';
import { registerVersionCommand } from './version.js';
import { registerWatchCommand } from './watch.js';

export type CommandRegistrar = (program: Command) => void;

export const COMMAND_REGISTRARS: CommandRegistrar[] = [
  registerWatchCommand,
  registerCheckCommand,
  registerPrintersCommand,
  registerLogsCommand,
  registerVersionCommand,
];

export const registerCliCommands = (program: Command): void => {
  COMMAND_REGISTRARS.forEach((register) => register(program));
};
