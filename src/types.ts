// Autoprint - rules, configuration and pipeline records
import { z } from 'zod';

/**
 * What happens after a matched file has been archived:
 * - never: archive only
 * - always: archive, then print
 * - prompt: archive, then ask before printing
 */
export type PrintMode = 'never' | 'always' | 'prompt';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Raw filesystem occurrence reported by the directory watcher. */
export type EventKind = 'created' | 'moved';

export interface WatchEvent {
  path: string;
  kind: EventKind;
}

// Compiled rule, evaluated in declaration order
export interface Rule {
  /** Pattern as written in the config file */
  pattern: string;
  regex: RegExp;
  /** Absolute destination directory, may still contain `{group}` placeholders */
  destination: string;
  printMode: PrintMode;
  printer?: string;
}

export interface TimingConfig {
  lockAttempts: number;
  lockIntervalMs: number;
  moveAttempts: number;
  moveBackoffMs: number;
  printSettleMs: number;
  pollIntervalMs: number;
  pollStableTicks: number;
  pollTimeoutMs: number;
}

export const DEFAULT_TIMING: TimingConfig = {
  lockAttempts: 10,
  lockIntervalMs: 500,
  moveAttempts: 3,
  moveBackoffMs: 1000,
  printSettleMs: 10000,
  pollIntervalMs: 1000,
  pollStableTicks: 3,
  pollTimeoutMs: 15000,
};

export interface AutoprintConfig {
  watchDirectory: string;
  defaultPrinter?: string;
  dedupeTtlSeconds: number;
  language: string;
  rules: Rule[];
  logging: {
    file: string;
    level: LogLevel;
  };
  notifications: {
    enabled: boolean;
  };
  timing: TimingConfig;
}

/** A matched, admitted file waiting for the worker. Frozen on enqueue. */
export interface QueueItem {
  readonly path: string;
  readonly rule: Rule;
  readonly groups: Readonly<Record<string, string>>;
  readonly destinationDir: string;
}

export interface PrintJob {
  id?: number;
  documentName: string;
}

// Zod schemas for validation of the config file

export const PatternRuleSchema = z.object({
  pattern: z.string().min(1),
  destination: z.string().min(1),
  print: z.union([z.boolean(), z.literal('prompt')]).default(false),
  printer: z.string().min(1).nullish(),
});

export const TimingSchema = z
  .object({
    lockAttempts: z.number().int().min(1),
    lockIntervalMs: z.number().int().min(0),
    moveAttempts: z.number().int().min(1),
    moveBackoffMs: z.number().int().min(0),
    printSettleMs: z.number().int().min(0),
    pollIntervalMs: z.number().int().min(0),
    pollStableTicks: z.number().int().min(1),
    pollTimeoutMs: z.number().int().min(0),
  })
  .partial();

export const AutoprintConfigSchema = z.object({
  watchDirectory: z.string().min(1).optional(),
  defaultPrinter: z.string().min(1).nullish(),
  dedupeTtlSeconds: z.number().int().min(0).default(30),
  language: z.string().min(1).default('en'),
  patterns: z.array(PatternRuleSchema),
  logging: z
    .object({
      file: z.string().min(1).optional(),
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
  notifications: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
  timing: TimingSchema.default({}),
});

export type PatternRuleInput = z.infer<typeof PatternRuleSchema>;
export type AutoprintConfigInput = z.infer<typeof AutoprintConfigSchema>;
