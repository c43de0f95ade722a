// Collaborator contracts. The pipeline only talks to these, so every one of
// them can be swapped for an in-memory fake.

import type { PrintJob, WatchEvent } from './types.js';
import type { Clock } from './utils/timing.js';

/**
 * Delivers create/rename occurrences for the files directly inside one
 * directory. Directory entries never reach the callback.
 */
export interface IDirectoryWatcher {
  start(directory: string, onEvent: (event: WatchEvent) => void): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Desktop notifications. Best-effort: implementations swallow and log
 * their own failures.
 */
export interface INotifier {
  notify(title: string, message: string, success: boolean): Promise<void>;
}

/**
 * Asks the user whether a file should be printed. Any internal failure
 * answers `false`.
 */
export interface IPrintConfirmer {
  confirm(filename: string): Promise<boolean>;
}

/**
 * OS print subsystem: default printer, submission and spooler contents.
 */
export interface IPrintSpooler {
  getDefaultPrinter(): Promise<string | undefined>;
  setDefaultPrinter(name: string): Promise<void>;
  submitPrint(filePath: string): Promise<void>;
  enumeratePrinters(): Promise<string[]>;
  enumerateJobs(printer: string): Promise<PrintJob[]>;
}

/**
 * Dependencies injected into the Autoprint service.
 */
export interface AutoprintDependencies {
  watcher: IDirectoryWatcher;
  notifier: INotifier;
  confirmer: IPrintConfirmer;
  spooler: IPrintSpooler;
  clock?: Clock;
}
